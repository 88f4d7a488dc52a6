/**
 * Key-frame selection with perceptual-hash deduplication.
 *
 * Candidates are grabbed in chronological order. A frame is kept only if its
 * fingerprint is at least `threshold` bits away from every frame kept so far
 * (first seen wins). Discarded images are deleted.
 */

import fs from "node:fs/promises";
import type { Segment } from "@vdigest/contracts";
import { logger as rootLogger, type Logger } from "../logger";
import { initMetrics } from "../metrics/metrics";
import { segmentMidpoint } from "../text/segment";
import type { FrameGrabber } from "./grab";
import { createPerceptualHasher, hammingDistance, type FrameHasher } from "./hash";
import { selectCandidates } from "./sample";

export const DEFAULT_DEDUP_THRESHOLD = 8;

export interface FrameCandidate {
  timestamp: number;
  /** Index into the segment list the instant was taken from */
  sourceIndex: number;
}

export interface KeyFrame extends FrameCandidate {
  imagePath: string;
  /** Perceptual hash, null when the image could not be fingerprinted */
  hash: string | null;
}

export interface DedupResult {
  kept: KeyFrame[];
  duplicates: number;
  grabFailures: number;
  /** Candidates actually grabbed or attempted before maxFrames was reached */
  processed: number;
}

export interface DeduplicateFramesOpts {
  candidates: FrameCandidate[];
  grabber: FrameGrabber;
  hasher?: FrameHasher;
  /** Stop after this many frames are kept (default 12) */
  maxFrames?: number;
  /** Hamming distance (0-64) below which a frame counts as a duplicate (default 8) */
  threshold?: number;
  /** Releases a discarded image (default: delete the file) */
  release?: (imagePath: string) => Promise<void>;
  logger?: Logger;
}

async function deleteFile(imagePath: string): Promise<void> {
  await fs.rm(imagePath, { force: true });
}

/**
 * A frame without a fingerprint is never a duplicate: there is nothing to judge it by.
 */
export function isDuplicate(hash: string | null, keptHashes: Array<string | null>, threshold: number): boolean {
  if (hash === null) return false;
  return keptHashes.some((kept) => kept !== null && hammingDistance(hash, kept) < threshold);
}

export async function deduplicateFrames(opts: DeduplicateFramesOpts): Promise<DedupResult> {
  const maxFrames = Math.max(0, opts.maxFrames ?? 12);
  const threshold = opts.threshold ?? DEFAULT_DEDUP_THRESHOLD;
  const log = opts.logger ?? rootLogger;
  const hasher = opts.hasher ?? createPerceptualHasher({ logger: log });
  const release = opts.release ?? deleteFile;
  const metrics = initMetrics();

  const ordered = [...opts.candidates].sort((a, b) => a.timestamp - b.timestamp);
  const kept: KeyFrame[] = [];
  const keptHashes: Array<string | null> = [];
  let duplicates = 0;
  let grabFailures = 0;
  let processed = 0;

  for (const candidate of ordered) {
    if (kept.length >= maxFrames) break;
    processed++;

    let imagePath: string | null;
    try {
      imagePath = await opts.grabber.grab(candidate.timestamp, candidate.sourceIndex);
    } catch (err) {
      log.warn({ timestamp: candidate.timestamp, err }, "Frame grabber threw; skipping candidate");
      imagePath = null;
    }
    if (!imagePath) {
      grabFailures++;
      metrics.framesTotal.inc({ outcome: "grab_failed" });
      continue;
    }

    let hash: string | null;
    try {
      hash = await hasher.hash(imagePath);
    } catch (err) {
      log.warn({ imagePath, err }, "Frame hasher threw; keeping frame unhashed");
      hash = null;
    }
    if (isDuplicate(hash, keptHashes, threshold)) {
      duplicates++;
      metrics.framesTotal.inc({ outcome: "duplicate" });
      try {
        await release(imagePath);
      } catch (err) {
        log.warn({ imagePath, err }, "Could not release duplicate frame");
      }
      continue;
    }

    metrics.framesTotal.inc({ outcome: hash === null ? "unhashed" : "kept" });
    keptHashes.push(hash);
    kept.push({ ...candidate, imagePath, hash });
  }

  log.debug(
    { candidates: ordered.length, processed, kept: kept.length, duplicates, grabFailures },
    "Frame dedup finished",
  );
  return { kept, duplicates, grabFailures, processed };
}

export interface SelectKeyFramesOpts extends Omit<DeduplicateFramesOpts, "candidates"> {
  segments: readonly Segment[];
  /** Candidates considered per wanted frame (default 3) */
  candidateMultiplier?: number;
}

/**
 * Representative frames for a transcript: uniformly sample up to
 * maxFrames * candidateMultiplier segments and grab each at its midpoint.
 */
export async function selectKeyFrames(opts: SelectKeyFramesOpts): Promise<KeyFrame[]> {
  const { segments, candidateMultiplier = 3, ...rest } = opts;
  const maxFrames = Math.max(0, rest.maxFrames ?? 12);
  if (segments.length === 0 || maxFrames === 0) return [];

  const candidates = selectCandidates(segments.length, maxFrames * candidateMultiplier).map((idx) => ({
    timestamp: segmentMidpoint(segments[idx]),
    sourceIndex: idx,
  }));
  const result = await deduplicateFrames({ ...rest, maxFrames, candidates });
  return result.kept;
}

export interface SelectFramesAtTimestampsOpts extends Omit<DeduplicateFramesOpts, "candidates" | "maxFrames"> {
  timestamps: readonly number[];
}

/**
 * Frames at explicit instants. Each instant stands in for a one-second window
 * centred on it (clamped at zero) and every instant is a candidate.
 * `sourceIndex` is the instant's position in `timestamps`; invalid instants are skipped.
 */
export async function selectKeyFramesAtTimestamps(opts: SelectFramesAtTimestampsOpts): Promise<KeyFrame[]> {
  const { timestamps, ...rest } = opts;
  const candidates: FrameCandidate[] = timestamps.flatMap((t, i) =>
    Number.isFinite(t) && t >= 0 ? [{ timestamp: (Math.max(0, t - 0.5) + t + 0.5) / 2, sourceIndex: i }] : [],
  );
  if (candidates.length === 0) return [];

  const result = await deduplicateFrames({ ...rest, candidates, maxFrames: candidates.length });
  return result.kept;
}
