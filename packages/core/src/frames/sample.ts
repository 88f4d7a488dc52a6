/**
 * Pick which segment indices get a frame grab.
 * Returns every index when there are few enough, otherwise a uniform stride
 * sample of exactly `maxCandidates` indices starting at 0.
 */
export function selectCandidates(segmentCount: number, maxCandidates: number): number[] {
  const n = Math.max(0, Math.floor(segmentCount));
  const max = Math.max(0, Math.floor(maxCandidates));
  if (n <= max) return Array.from({ length: n }, (_, i) => i);

  const step = n / max;
  return Array.from({ length: max }, (_, i) => Math.floor(i * step));
}
