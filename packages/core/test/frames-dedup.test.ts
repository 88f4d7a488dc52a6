import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import pino from "pino";
import type { Segment } from "@vdigest/contracts";
import {
  deduplicateFrames,
  isDuplicate,
  selectKeyFrames,
  selectKeyFramesAtTimestamps,
  type FrameCandidate,
} from "../src/frames/dedup";
import type { FrameGrabber } from "../src/frames/grab";
import type { FrameHasher } from "../src/frames/hash";
import { initMetrics, type FrameOutcome } from "../src/metrics/metrics";

const silent = pino({ level: "silent" });

const ZERO = "0000000000000000";
const ONE_BIT = "0000000000000001";
const EIGHT_BITS = "00000000000000ff";
const ALL = "ffffffffffffffff";

function makeGrabber(failing: number[] = []) {
  const calls: number[] = [];
  const grabber: FrameGrabber = {
    async grab(timestamp, sourceIndex) {
      calls.push(timestamp);
      if (failing.includes(sourceIndex)) return null;
      return `/frames/${sourceIndex}.jpg`;
    },
  };
  return { grabber, calls };
}

function makeHasher(byIndex: Record<number, string | null>): FrameHasher {
  return {
    async hash(imagePath) {
      const match = /\/(\d+)\.jpg$/.exec(imagePath);
      const idx = match ? Number(match[1]) : -1;
      return byIndex[idx] ?? null;
    },
  };
}

function makeRelease() {
  const released: string[] = [];
  return { released, release: async (p: string) => void released.push(p) };
}

function candidates(...timestamps: number[]): FrameCandidate[] {
  return timestamps.map((timestamp, sourceIndex) => ({ timestamp, sourceIndex }));
}

async function outcomeCount(outcome: FrameOutcome): Promise<number> {
  const metric = await initMetrics().framesTotal.get();
  return metric.values.find((v) => v.labels.outcome === outcome)?.value ?? 0;
}

// ─── Duplicate rule ──────────────────────────────────────────────────────────

test("distance below the threshold is a duplicate, at the threshold it is not", () => {
  assert.equal(isDuplicate(ZERO, [EIGHT_BITS], 8), false);
  assert.equal(isDuplicate(ZERO, [EIGHT_BITS], 9), true);
  assert.equal(isDuplicate(ZERO, [ALL, ONE_BIT], 8), true);
});

test("unhashed frames are never duplicates and never match", () => {
  assert.equal(isDuplicate(null, [ZERO], 8), false);
  assert.equal(isDuplicate(ZERO, [null], 8), false);
});

test("threshold 0 keeps everything", () => {
  assert.equal(isDuplicate(ZERO, [ZERO], 0), false);
});

// ─── deduplicateFrames ───────────────────────────────────────────────────────

test("first seen wins in chronological order and duplicates are released", async () => {
  const { grabber, calls } = makeGrabber();
  const { released, release } = makeRelease();
  // input order is not time order: index 0 at 30s, 1 at 10s, 2 at 20s
  const result = await deduplicateFrames({
    candidates: candidates(30, 10, 20),
    grabber,
    hasher: makeHasher({ 0: ALL, 1: ZERO, 2: ONE_BIT }),
    release,
    logger: silent,
  });

  assert.deepEqual(calls, [10, 20, 30]);
  assert.deepEqual(
    result.kept.map((f) => [f.sourceIndex, f.timestamp, f.imagePath, f.hash]),
    [
      [1, 10, "/frames/1.jpg", ZERO],
      [0, 30, "/frames/0.jpg", ALL],
    ],
  );
  assert.equal(result.duplicates, 1);
  assert.equal(result.processed, 3);
  assert.deepEqual(released, ["/frames/2.jpg"]);
});

test("stops grabbing once maxFrames are kept", async () => {
  const { grabber, calls } = makeGrabber();
  const result = await deduplicateFrames({
    candidates: candidates(0, 1, 2, 3, 4),
    grabber,
    hasher: makeHasher({}),
    maxFrames: 2,
    logger: silent,
  });
  assert.equal(result.kept.length, 2);
  assert.equal(result.processed, 2);
  assert.deepEqual(calls, [0, 1]);
});

test("grab failures and throwing grabbers are skipped", async () => {
  const { grabber } = makeGrabber([1]);
  const throwing: FrameGrabber = {
    async grab(timestamp, sourceIndex) {
      if (sourceIndex === 2) throw new Error("decoder crashed");
      return grabber.grab(timestamp, sourceIndex);
    },
  };
  const result = await deduplicateFrames({
    candidates: candidates(0, 5, 10, 15),
    grabber: throwing,
    hasher: makeHasher({ 0: ZERO, 3: ALL }),
    logger: silent,
  });
  assert.deepEqual(
    result.kept.map((f) => f.sourceIndex),
    [0, 3],
  );
  assert.equal(result.grabFailures, 2);
  assert.equal(result.duplicates, 0);
});

test("an unhashed frame is kept and does not shadow later frames", async () => {
  const { grabber } = makeGrabber();
  const { released, release } = makeRelease();
  const result = await deduplicateFrames({
    candidates: candidates(0, 1, 2),
    grabber,
    hasher: makeHasher({ 0: null, 1: ZERO, 2: ZERO }),
    release,
    logger: silent,
  });
  assert.deepEqual(
    result.kept.map((f) => f.hash),
    [null, ZERO],
  );
  assert.deepEqual(released, ["/frames/2.jpg"]);
});

test("kept hashes stay pairwise at least threshold apart", async () => {
  const hashes = [ZERO, ONE_BIT, EIGHT_BITS, "000000000000000f", ALL, "fffffffffffffff0"];
  const { grabber } = makeGrabber();
  const result = await deduplicateFrames({
    candidates: candidates(...hashes.map((_, i) => i)),
    grabber,
    hasher: makeHasher(Object.fromEntries(hashes.map((h, i) => [i, h]))),
    release: async () => {},
    logger: silent,
  });
  assert.deepEqual(
    result.kept.map((f) => f.hash),
    [ZERO, EIGHT_BITS, ALL],
  );
});

test("a throwing hasher leaves the frame kept and unhashed", async () => {
  const { grabber } = makeGrabber();
  const hasher: FrameHasher = {
    async hash(imagePath) {
      if (imagePath === "/frames/1.jpg") throw new Error("corrupt");
      return imagePath === "/frames/0.jpg" ? ZERO : ALL;
    },
  };
  const result = await deduplicateFrames({ candidates: candidates(0, 1, 2), grabber, hasher, logger: silent });
  assert.deepEqual(
    result.kept.map((f) => [f.sourceIndex, f.hash]),
    [
      [0, ZERO],
      [1, null],
      [2, ALL],
    ],
  );
});

test("a failed release does not stop deduplication", async () => {
  const { grabber } = makeGrabber();
  const attempted: string[] = [];
  const result = await deduplicateFrames({
    candidates: candidates(0, 1, 2, 3),
    grabber,
    hasher: makeHasher({ 0: ZERO, 1: ZERO, 2: ZERO, 3: ALL }),
    release: async (p) => {
      attempted.push(p);
      throw new Error("EPERM: operation not permitted");
    },
    logger: silent,
  });
  assert.deepEqual(attempted, ["/frames/1.jpg", "/frames/2.jpg"]);
  assert.equal(result.duplicates, 2);
  assert.deepEqual(
    result.kept.map((f) => f.sourceIndex),
    [0, 3],
  );
});

test("duplicate images are deleted from disk by default", async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "vdigest-dedup-"));
  try {
    const grabber: FrameGrabber = {
      async grab(_timestamp, sourceIndex) {
        const p = path.join(dir, `${sourceIndex}.jpg`);
        await fs.writeFile(p, "jpeg");
        return p;
      },
    };
    const result = await deduplicateFrames({
      candidates: candidates(0, 1),
      grabber,
      hasher: makeHasher({ 0: ZERO, 1: ZERO }),
      logger: silent,
    });
    assert.equal(result.kept.length, 1);
    assert.deepEqual(await fs.readdir(dir), ["0.jpg"]);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});

test("frame outcomes are counted", async () => {
  const before = await outcomeCount("duplicate");
  const { grabber } = makeGrabber();
  await deduplicateFrames({
    candidates: candidates(0, 1, 2),
    grabber,
    hasher: makeHasher({ 0: ZERO, 1: ZERO, 2: ZERO }),
    release: async () => {},
    logger: silent,
  });
  assert.equal((await outcomeCount("duplicate")) - before, 2);
});

// ─── Key-frame selection ─────────────────────────────────────────────────────

test("selectKeyFrames grabs sampled segment midpoints", async () => {
  const segments: Segment[] = Array.from({ length: 10 }, (_, i) => ({ start: i * 10, end: i * 10 + 10, text: `s${i}` }));
  const { grabber, calls } = makeGrabber();
  const kept = await selectKeyFrames({
    segments,
    grabber,
    // everything after the first frame is a duplicate, so every candidate gets grabbed
    hasher: { hash: async () => ZERO },
    release: async () => {},
    maxFrames: 2,
    candidateMultiplier: 3,
    logger: silent,
  });
  assert.deepEqual(calls, [5, 15, 35, 55, 65, 85]);
  assert.equal(kept.length, 1);
  assert.equal(kept[0].sourceIndex, 0);
});

test("selectKeyFrames with no segments or no frame budget does nothing", async () => {
  const { grabber, calls } = makeGrabber();
  assert.deepEqual(await selectKeyFrames({ segments: [], grabber, logger: silent }), []);
  assert.deepEqual(
    await selectKeyFrames({ segments: [{ start: 0, end: 1, text: "x" }], grabber, maxFrames: 0, logger: silent }),
    [],
  );
  assert.deepEqual(calls, []);
});

test("selectKeyFramesAtTimestamps centres a one-second window on each valid instant", async () => {
  const { grabber } = makeGrabber();
  const kept = await selectKeyFramesAtTimestamps({
    timestamps: [0.25, 40, -3, Number.NaN, 12],
    grabber,
    hasher: makeHasher({}),
    logger: silent,
  });
  assert.deepEqual(
    kept.map((f) => [f.timestamp, f.sourceIndex]),
    [
      [0.375, 0],
      [12, 4],
      [40, 1],
    ],
  );
});
