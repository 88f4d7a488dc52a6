import fs from "node:fs";
import path from "node:path";
import { DigestConfigSchema, type DigestConfig } from "@vdigest/contracts";
import { DigestError } from "../errors";

type ConfigKey = keyof DigestConfig;

const ENV_KEYS: Record<ConfigKey, string> = {
  mergeWindowSeconds: "VDIGEST_MERGE_WINDOW_SECONDS",
  maxTranscriptChars: "VDIGEST_MAX_TRANSCRIPT_CHARS",
  lineOverheadChars: "VDIGEST_LINE_OVERHEAD_CHARS",
  maxFrames: "VDIGEST_MAX_FRAMES",
  candidateMultiplier: "VDIGEST_CANDIDATE_MULTIPLIER",
  dedupThreshold: "VDIGEST_DEDUP_THRESHOLD",
  maxImagesPerCall: "VDIGEST_MAX_IMAGES_PER_CALL",
  outputLanguage: "VDIGEST_OUTPUT_LANGUAGE",
  keyMoments: "VDIGEST_KEY_MOMENTS",
  diagram: "VDIGEST_DIAGRAM",
  maxKeyPoints: "VDIGEST_MAX_KEY_POINTS",
  keyPointPrefixLength: "VDIGEST_KEY_POINT_PREFIX_LENGTH",
};

const STRING_KEYS = new Set<string>(["outputLanguage"]);
const BOOLEAN_KEYS = new Set<string>(["keyMoments", "diagram"]);

function clean(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

export function parseDotEnv(text: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) continue;
    const m = line.match(/^([A-Za-z_][A-Za-z0-9_]*)=(.*)$/);
    if (!m) continue;
    const key = m[1];
    let value = m[2] ?? "";
    if (
      (value.startsWith('"') && value.endsWith('"') && value.length >= 2) ||
      (value.startsWith("'") && value.endsWith("'") && value.length >= 2)
    ) {
      value = value.slice(1, -1);
    }
    out[key] = value;
  }
  return out;
}

function findUp(startDir: string, fileName: string, maxDepth = 8): string | null {
  let dir = startDir;
  for (let i = 0; i < maxDepth; i++) {
    const candidate = path.join(dir, fileName);
    if (fs.existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return null;
}

function readDotEnvFile(startDir: string, fileName: string): Record<string, string> {
  const file = findUp(startDir, fileName, 8);
  if (!file) return {};
  return parseDotEnv(fs.readFileSync(file, "utf8"));
}

function coerce(key: string, name: string, raw: string): string | number | boolean {
  if (STRING_KEYS.has(key)) return raw;
  if (BOOLEAN_KEYS.has(key)) {
    const lowered = raw.toLowerCase();
    if (["1", "true", "yes", "on"].includes(lowered)) return true;
    if (["0", "false", "no", "off"].includes(lowered)) return false;
    throw new DigestError({ code: "INVALID_CONFIG", message: `${name} must be a boolean, got "${raw}"` });
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new DigestError({ code: "INVALID_CONFIG", message: `${name} must be a number, got "${raw}"` });
  }
  return parsed;
}

export interface LoadDigestConfigOpts {
  /** Environment to read VDIGEST_* variables from (default process.env) */
  env?: Record<string, string | undefined>;
  /** Directory to start the .env / .env.example lookup from (default process.cwd()) */
  cwd?: string;
}

/**
 * Resolve the pipeline configuration.
 * Precedence: explicit overrides, environment, .env, .env.example, schema defaults.
 */
export function loadDigestConfig(overrides?: Partial<DigestConfig>, opts?: LoadDigestConfigOpts): DigestConfig {
  const env = opts?.env ?? process.env;
  const cwd = opts?.cwd ?? process.cwd();
  const envExample = readDotEnvFile(cwd, ".env.example");
  const envLocal = readDotEnvFile(cwd, ".env");

  const input: Record<string, unknown> = {};
  for (const [key, name] of Object.entries(ENV_KEYS)) {
    const raw = clean(env[name]) || clean(envLocal[name]) || clean(envExample[name]);
    if (raw) input[key] = coerce(key, name, raw);
  }
  for (const [key, value] of Object.entries(overrides ?? {})) {
    if (value !== undefined) input[key] = value;
  }

  const parsed = DigestConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new DigestError({
      code: "INVALID_CONFIG",
      message: `Invalid digest configuration: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`,
      details: parsed.error.issues,
    });
  }
  return parsed.data;
}
