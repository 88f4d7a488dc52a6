import type { Segment } from "@vdigest/contracts";

export function segmentMidpoint(segment: Segment): number {
  return (segment.start + segment.end) / 2;
}

export function segmentDuration(segment: Segment): number {
  return segment.end - segment.start;
}

/** `[MM:SS]`, or `[HH:MM:SS]` from one hour on. */
export function formatTimestamp(seconds: number): string {
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  const s = Math.floor(seconds % 60);
  const pad = (n: number) => String(n).padStart(2, "0");
  return h > 0 ? `[${pad(h)}:${pad(m)}:${pad(s)}]` : `[${pad(m)}:${pad(s)}]`;
}

export function segmentTimestamp(segment: Segment): string {
  return formatTimestamp(segment.start);
}

/**
 * Render segments as the timestamped transcript sent for analysis, one line each:
 *   [MM:SS] text
 */
export function segmentsToText(segments: readonly Segment[]): string {
  return segments.map((s) => `${segmentTimestamp(s)} ${s.text}`).join("\n");
}
