/**
 * Perceptual hashing (pHash) for frame deduplication.
 *
 * Algorithm:
 * 1. Box-filter the grayscale image down to 32x32
 * 2. 2D DCT-II, keep the lowest 8x8 frequencies
 * 3. Each coefficient: 1 if above the block median, else 0
 * 4. Pack into a 64-bit hex string
 *
 * Pixels are decoded through ffmpeg, so no native image dependencies are needed.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { logger as rootLogger, type Logger } from "../logger";

const execFileAsync = promisify(execFile);

const SAMPLE_SIZE = 32;
const HASH_SIZE = 8;

/** 8-bit grayscale raster, row-major. */
export interface GrayImage {
  width: number;
  height: number;
  data: Uint8Array;
}

export type PixelLoader = (imagePath: string) => Promise<GrayImage>;

export interface FrameHasher {
  /** 16-char hex fingerprint, or null when the image cannot be decoded. */
  hash(imagePath: string): Promise<string | null>;
}

function assertValidImage(image: GrayImage): void {
  if (image.width <= 0 || image.height <= 0 || image.data.length !== image.width * image.height) {
    throw new Error(`Invalid grayscale image ${image.width}x${image.height} with ${image.data.length} bytes`);
  }
}

/** Area-average resample to size x size. */
export function resizeGray(image: GrayImage, size: number): Float64Array {
  assertValidImage(image);
  const out = new Float64Array(size * size);
  for (let ty = 0; ty < size; ty++) {
    const y0 = Math.floor((ty * image.height) / size);
    const y1 = Math.max(y0 + 1, Math.floor(((ty + 1) * image.height) / size));
    for (let tx = 0; tx < size; tx++) {
      const x0 = Math.floor((tx * image.width) / size);
      const x1 = Math.max(x0 + 1, Math.floor(((tx + 1) * image.width) / size));
      let sum = 0;
      for (let y = y0; y < y1; y++) {
        for (let x = x0; x < x1; x++) sum += image.data[y * image.width + x];
      }
      out[ty * size + tx] = sum / ((y1 - y0) * (x1 - x0));
    }
  }
  return out;
}

/** Lowest `keep` x `keep` coefficients of the unnormalized 2D DCT-II of a size x size block. */
export function lowFrequencyDct(pixels: Float64Array, size: number, keep: number): Float64Array {
  const cos = new Float64Array(keep * size);
  for (let k = 0; k < keep; k++) {
    for (let n = 0; n < size; n++) cos[k * size + n] = Math.cos((Math.PI * (2 * n + 1) * k) / (2 * size));
  }

  // Rows first: size rows x keep columns
  const rows = new Float64Array(size * keep);
  for (let y = 0; y < size; y++) {
    for (let k = 0; k < keep; k++) {
      let acc = 0;
      for (let x = 0; x < size; x++) acc += pixels[y * size + x] * cos[k * size + x];
      rows[y * keep + k] = acc;
    }
  }

  const out = new Float64Array(keep * keep);
  for (let j = 0; j < keep; j++) {
    for (let k = 0; k < keep; k++) {
      let acc = 0;
      for (let y = 0; y < size; y++) acc += rows[y * keep + k] * cos[j * size + y];
      out[j * keep + k] = acc;
    }
  }
  return out;
}

function median(values: Float64Array): number {
  const sorted = Array.from(values).sort((a, b) => a - b);
  const mid = sorted.length / 2;
  return (sorted[mid - 1] + sorted[mid]) / 2;
}

export function perceptualHash(image: GrayImage): string {
  const coeffs = lowFrequencyDct(resizeGray(image, SAMPLE_SIZE), SAMPLE_SIZE, HASH_SIZE);
  const med = median(coeffs);

  let hash = BigInt(0);
  for (let i = 0; i < coeffs.length; i++) {
    if (coeffs[i] > med) {
      hash |= BigInt(1) << BigInt(63 - i);
    }
  }
  return hash.toString(16).padStart(16, "0");
}

/**
 * Compute Hamming distance between two 64-bit hex hashes.
 * Returns number of differing bits (0 = identical, 64 = maximally different).
 */
export function hammingDistance(hash1: string, hash2: string): number {
  if (hash1.length !== hash2.length) {
    throw new Error(`Cannot compare hashes of different length (${hash1.length} vs ${hash2.length})`);
  }

  let xor = BigInt(`0x${hash1}`) ^ BigInt(`0x${hash2}`);
  let count = 0;
  while (xor > BigInt(0)) {
    count += Number(xor & BigInt(1));
    xor >>= BigInt(1);
  }
  return count;
}

/** Decode an image to a 32x32 grayscale raster with ffmpeg. */
export async function loadGrayPixels(imagePath: string): Promise<GrayImage> {
  const { stdout } = await execFileAsync(
    "ffmpeg",
    [
      "-v", "error",
      "-i", imagePath,
      "-vf", `scale=${SAMPLE_SIZE}:${SAMPLE_SIZE},format=gray`,
      "-f", "rawvideo",
      "-pix_fmt", "gray",
      "-",
    ],
    { encoding: "buffer", timeout: 10_000, maxBuffer: 1024 * 1024 },
  );

  const expected = SAMPLE_SIZE * SAMPLE_SIZE;
  if (stdout.length < expected) {
    throw new Error(`ffmpeg produced ${stdout.length} bytes for ${imagePath}, expected ${expected}`);
  }
  return { width: SAMPLE_SIZE, height: SAMPLE_SIZE, data: new Uint8Array(stdout.subarray(0, expected)) };
}

export function createPerceptualHasher(opts?: { loadPixels?: PixelLoader; logger?: Logger }): FrameHasher {
  const loadPixels = opts?.loadPixels ?? loadGrayPixels;
  const log = opts?.logger ?? rootLogger;

  return {
    async hash(imagePath: string): Promise<string | null> {
      try {
        return perceptualHash(await loadPixels(imagePath));
      } catch (err) {
        log.debug({ imagePath, err }, "Could not fingerprint frame");
        return null;
      }
    },
  };
}
