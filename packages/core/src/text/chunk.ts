import type { Segment } from "@vdigest/contracts";

/** Per-line cost of the `[HH:MM:SS] ` prefix each segment gets in the rendered transcript. */
export const DEFAULT_LINE_OVERHEAD = 12;

export function segmentCost(segment: Segment, lineOverhead = DEFAULT_LINE_OVERHEAD): number {
  return segment.text.length + lineOverhead;
}

/**
 * Partition segments into consecutive groups whose summed cost stays within `maxChars`.
 * A segment that alone exceeds the budget gets a group of its own; nothing is split or dropped.
 */
export function chunkSegments(
  segments: readonly Segment[],
  opts?: {
    maxChars?: number;
    lineOverhead?: number;
  },
): Segment[][] {
  const maxChars = opts?.maxChars ?? 60_000;
  const lineOverhead = Math.max(0, opts?.lineOverhead ?? DEFAULT_LINE_OVERHEAD);

  const chunks: Segment[][] = [];
  let buf: Segment[] = [];
  let bufLen = 0;

  for (const seg of segments) {
    const cost = segmentCost(seg, lineOverhead);
    if (bufLen + cost > maxChars && buf.length > 0) {
      chunks.push(buf);
      buf = [];
      bufLen = 0;
    }
    buf.push(seg);
    bufLen += cost;
  }

  if (buf.length > 0) chunks.push(buf);
  return chunks;
}
