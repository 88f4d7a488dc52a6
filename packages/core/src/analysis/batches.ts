import type { Segment } from "@vdigest/contracts";
import type { KeyFrame } from "../frames/dedup";
import { chunkSegments } from "../text/chunk";

export interface AnalysisBatch {
  index: number;
  segments: Segment[];
  /** Frames within the batch's time span, capped at maxImagesPerCall */
  frames: KeyFrame[];
}

/** Frames whose timestamp falls within [first.start, last.end] of the segments. */
export function framesForSegments(frames: readonly KeyFrame[], segments: readonly Segment[]): KeyFrame[] {
  if (frames.length === 0 || segments.length === 0) return [];
  const start = segments[0].start;
  const end = segments[segments.length - 1].end;
  return frames.filter((f) => f.timestamp >= start && f.timestamp <= end);
}

export function buildAnalysisBatches(
  segments: readonly Segment[],
  frames: readonly KeyFrame[],
  opts?: {
    maxChars?: number;
    lineOverhead?: number;
    maxImagesPerCall?: number;
  },
): AnalysisBatch[] {
  const maxImages = Math.max(0, opts?.maxImagesPerCall ?? 4);
  return chunkSegments(segments, { maxChars: opts?.maxChars, lineOverhead: opts?.lineOverhead }).map(
    (chunk, index) => ({
      index,
      segments: chunk,
      frames: framesForSegments(frames, chunk).slice(0, maxImages),
    }),
  );
}
