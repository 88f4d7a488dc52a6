import type { Segment } from "@vdigest/contracts";

/**
 * Greedily merge consecutive segments into chunks spanning at most `windowSeconds`,
 * measured from the chunk's first segment start to the candidate segment's end.
 * Decisions are forward-only: a closed chunk is never revisited.
 */
export function mergeSegments(segments: readonly Segment[], windowSeconds = 60): Segment[] {
  if (segments.length === 0) return [];

  const merged: Segment[] = [];
  let start = segments[0].start;
  let end = segments[0].end;
  let texts = [segments[0].text];

  for (let i = 1; i < segments.length; i++) {
    const seg = segments[i];
    if (seg.end - start <= windowSeconds) {
      end = seg.end;
      texts.push(seg.text);
      continue;
    }
    merged.push({ start, end, text: texts.join(" ") });
    start = seg.start;
    end = seg.end;
    texts = [seg.text];
  }

  merged.push({ start, end, text: texts.join(" ") });
  return merged;
}
