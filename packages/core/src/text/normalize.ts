import type { RawSegment, Segment } from "@vdigest/contracts";

const MUSIC_TAG_RE = /\[(music|Music|MUSIC)\]/g;

export function normalizeSegmentText(text: string): string {
  return text
    .replace(MUSIC_TAG_RE, "")
    .replace(/\u00A0/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Clean speech-to-text output into segments: collapse whitespace, drop
 * music markers and empty entries, clamp negative times and inverted ranges.
 */
export function normalizeAsrSegments(raw: readonly RawSegment[]): Segment[] {
  const out: Segment[] = [];
  for (const r of raw) {
    const text = normalizeSegmentText(r.text);
    if (!text) continue;
    const start = Math.max(0, r.start);
    out.push({ start, end: Math.max(start, r.end), text });
  }
  return out;
}
