import type { DigestChapter } from "@vdigest/contracts";
import type { KeyFrame } from "../frames/dedup";

export interface ChapterWithFrame extends DigestChapter {
  /** Screenshot nearest the chapter start, unless an earlier chapter already took it */
  frame: KeyFrame | null;
}

export function nearestFrame(frames: readonly KeyFrame[], seconds: number): KeyFrame | null {
  let best: KeyFrame | null = null;
  for (const frame of frames) {
    if (!best || Math.abs(frame.timestamp - seconds) < Math.abs(best.timestamp - seconds)) best = frame;
  }
  return best;
}

export function assignChapterFrames(
  chapters: readonly DigestChapter[],
  frames: readonly KeyFrame[],
): ChapterWithFrame[] {
  const used = new Set<string>();
  return chapters.map((chapter) => {
    const candidate = nearestFrame(frames, chapter.start_seconds);
    if (!candidate || used.has(candidate.imagePath)) return { ...chapter, frame: null };
    used.add(candidate.imagePath);
    return { ...chapter, frame: candidate };
  });
}
