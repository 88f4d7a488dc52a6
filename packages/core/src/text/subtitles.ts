import fs from "node:fs/promises";
import type { Segment } from "@vdigest/contracts";
import { CaptionFileError } from "../errors";
import { logger as rootLogger, type Logger } from "../logger";

// SRT uses a comma before the milliseconds, WebVTT a dot.
const TIMING_RE = /(\d{2}):(\d{2}):(\d{2})[,.](\d{3})\s*-->\s*(\d{2}):(\d{2}):(\d{2})[,.](\d{3})/;

// Inline markup such as <i>, <font color="white">, <c.colorE5E5E5> or cue timing tags <00:00:01.234>.
const TAG_RE = /<[^>]+>/g;

const BLOCK_SEPARATOR_RE = /\n[ \t]*\n/;

export interface ParsedSubtitles {
  segments: Segment[];
  /** Blocks dropped for lacking a timing line or text. */
  skippedBlocks: number;
}

export function stripMarkupTags(text: string): string {
  return text.replace(TAG_RE, "");
}

function toSeconds(h: string, m: string, s: string, ms: string): number {
  return Number(h) * 3600 + Number(m) * 60 + Number(s) + Number(ms) / 1000;
}

function decode(input: string | Uint8Array): string {
  const text = typeof input === "string" ? input : Buffer.from(input).toString("utf8");
  return text.replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n");
}

function parseBlock(block: string): Segment | null {
  const lines = block
    .split("\n")
    .map((l) => l.trim())
    .filter(Boolean);

  let timing: RegExpExecArray | null = null;
  let textStart = 0;
  for (let i = 0; i < lines.length; i++) {
    timing = TIMING_RE.exec(lines[i]);
    if (timing) {
      textStart = i + 1;
      break;
    }
  }
  if (!timing || textStart >= lines.length) return null;

  const text = stripMarkupTags(lines.slice(textStart).join(" ")).trim();
  if (!text) return null;

  return {
    start: toSeconds(timing[1], timing[2], timing[3], timing[4]),
    end: toSeconds(timing[5], timing[6], timing[7], timing[8]),
    text,
  };
}

/**
 * Parse SRT or WebVTT caption text into segments, in file order.
 * Malformed blocks are skipped; invalid UTF-8 is replaced rather than rejected.
 */
export function parseSubtitleBlocks(input: string | Uint8Array): ParsedSubtitles {
  const text = decode(input).trim();
  if (!text) return { segments: [], skippedBlocks: 0 };

  const segments: Segment[] = [];
  let skippedBlocks = 0;
  for (const block of text.split(BLOCK_SEPARATOR_RE)) {
    const segment = parseBlock(block);
    if (segment) segments.push(segment);
    else skippedBlocks++;
  }
  return { segments, skippedBlocks };
}

export function parseSubtitles(input: string | Uint8Array): Segment[] {
  return parseSubtitleBlocks(input).segments;
}

export async function readSubtitleFile(filePath: string, opts?: { logger?: Logger }): Promise<Segment[]> {
  const log = opts?.logger ?? rootLogger;
  let bytes: Buffer;
  try {
    bytes = await fs.readFile(filePath);
  } catch (err) {
    throw new CaptionFileError(filePath, err);
  }

  const { segments, skippedBlocks } = parseSubtitleBlocks(bytes);
  log.debug({ filePath, segments: segments.length, skippedBlocks }, "Parsed caption file");
  return segments;
}
