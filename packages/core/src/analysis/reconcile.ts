import { DigestResponseSchema, type DigestResponse } from "@vdigest/contracts";

export interface MergeChunkResultsOpts {
  /** Cap for deduplicated list fields such as key_points (default 10) */
  maxListItems?: number;
  /** Characters of the normalized item compared for duplicates (default 60) */
  keyPrefixLength?: number;
}

export function normalizeListKey(item: unknown, prefixLength: number): string {
  const text = typeof item === "string" ? item : JSON.stringify(item) ?? "";
  return text.trim().toLowerCase().slice(0, prefixLength);
}

/** First occurrence wins; the result holds at most `limit` items. */
export function dedupeList(items: readonly unknown[], prefixLength: number, limit: number): unknown[] {
  const seen = new Set<string>();
  const out: unknown[] = [];
  for (const item of items) {
    if (out.length >= limit) break;
    const key = normalizeListKey(item, prefixLength);
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(item);
  }
  return out;
}

/**
 * Combine per-chunk analysis results into one.
 *
 * - one result is returned as-is
 * - `chapters` are concatenated in chunk order (chunks are chronological)
 * - `overview` strings are trimmed and joined with a space; blank ones are skipped
 * - every other list field is concatenated, then deduplicated and capped
 * - any other field keeps its first value
 */
export function mergeChunkResults(
  results: readonly Record<string, unknown>[],
  opts?: MergeChunkResultsOpts,
): Record<string, unknown> {
  if (results.length === 1) return results[0];

  const maxListItems = opts?.maxListItems ?? 10;
  const keyPrefixLength = opts?.keyPrefixLength ?? 60;

  const chapters: unknown[] = [];
  const overviews: string[] = [];
  const lists = new Map<string, unknown[]>();
  const scalars: Record<string, unknown> = {};

  for (const result of results) {
    for (const [key, value] of Object.entries(result)) {
      if (key === "chapters") {
        if (Array.isArray(value)) chapters.push(...value);
      } else if (key === "overview") {
        // Blank or non-string overviews are left out of the join.
        if (typeof value === "string" && value.trim()) overviews.push(value.trim());
      } else if (Array.isArray(value)) {
        const list = lists.get(key) ?? [];
        list.push(...value);
        lists.set(key, list);
      } else if (!(key in scalars) && value !== undefined && value !== null) {
        scalars[key] = value;
      }
    }
  }

  const merged: Record<string, unknown> = { ...scalars };
  for (const [key, list] of lists) {
    merged[key] = dedupeList(list, keyPrefixLength, maxListItems);
  }
  merged.overview = overviews.join(" ");
  merged.chapters = chapters;
  return merged;
}

/** Read the reconciled mapping into the digest shape; absent or ill-typed fields become empty. */
export function toDigestResponse(merged: Record<string, unknown>): DigestResponse {
  return DigestResponseSchema.parse(merged);
}
