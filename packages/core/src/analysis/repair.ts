/**
 * Lenient parsing of model output that is supposed to be a JSON object.
 *
 * Handles the failure modes seen in practice: markdown code fences around the
 * payload, raw newlines/tabs inside string values, and unescaped double quotes
 * inside string values. It is not a general relaxed-JSON parser.
 */

import { MalformedResponseError } from "../errors";

const FENCE = "```";
const STRUCTURAL_AFTER_STRING = new Set([",", "}", "]", ":"]);
const WHITESPACE = new Set([" ", "\t", "\r", "\n"]);

export function stripCodeFences(raw: string): string {
  let text = raw.trim();
  if (text.startsWith(FENCE)) {
    text = text.split(/\r?\n/).slice(1).join("\n");
  }
  if (text.endsWith(FENCE)) {
    text = text.slice(0, text.lastIndexOf(FENCE));
  }
  return text;
}

/**
 * Escape control characters and stray quotes inside JSON string literals.
 *
 * A `"` inside a string only closes it when the next non-whitespace character is
 * `,` `}` `]` `:` or the end of input; any other quote is taken as part of the value.
 * Existing escape sequences pass through untouched.
 */
export function escapeJsonStrings(text: string): string {
  let out = "";
  let inString = false;
  const n = text.length;

  for (let i = 0; i < n; i++) {
    const ch = text[i];

    if (!inString) {
      if (ch === '"') inString = true;
      out += ch;
      continue;
    }

    if (ch === "\\" && i + 1 < n) {
      out += ch + text[i + 1];
      i++;
    } else if (ch === '"') {
      let j = i + 1;
      while (j < n && WHITESPACE.has(text[j])) j++;
      if (j >= n || STRUCTURAL_AFTER_STRING.has(text[j])) {
        inString = false;
        out += '"';
      } else {
        out += '\\"';
      }
    } else if (ch === "\n") {
      out += "\\n";
    } else if (ch === "\r") {
      out += "\\r";
    } else if (ch === "\t") {
      out += "\\t";
    } else {
      out += ch;
    }
  }

  return out;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Repair and parse a model response into an object.
 * Throws MalformedResponseError (with the raw text attached) when that is not possible.
 */
export function parseModelJson(raw: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(escapeJsonStrings(stripCodeFences(raw)));
  } catch (err) {
    throw new MalformedResponseError(raw, err);
  }
  if (!isRecord(parsed)) throw new MalformedResponseError(raw);
  return parsed;
}
