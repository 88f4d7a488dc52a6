import { execFile } from "node:child_process";
import { promisify } from "node:util";
import fs from "node:fs/promises";
import path from "node:path";
import { logger as rootLogger, type Logger } from "../logger";

const execFileAsync = promisify(execFile);

export interface FrameGrabber {
  /** Path of the extracted image, or null when nothing could be grabbed at that instant. */
  grab(timestamp: number, sourceIndex: number): Promise<string | null>;
}

export interface FfmpegGrabberOpts {
  /** JPEG quality scale, 2 (best) to 31 (worst). Default 2. */
  qscale?: number;
  timeoutMs?: number;
  logger?: Logger;
}

export function frameFileName(sourceIndex: number, timestamp: number): string {
  return `frame_${String(sourceIndex).padStart(4, "0")}_${String(Math.floor(timestamp)).padStart(5, "0")}.jpg`;
}

/**
 * Grab single frames from a local video file with ffmpeg.
 * Seeks before opening the input (fast seek to the nearest keyframe).
 */
export function createFfmpegFrameGrabber(
  videoPath: string,
  outputDir: string,
  opts?: FfmpegGrabberOpts,
): FrameGrabber {
  const qscale = Math.min(31, Math.max(2, opts?.qscale ?? 2));
  const timeoutMs = opts?.timeoutMs ?? 60_000;
  const log = opts?.logger ?? rootLogger;

  return {
    async grab(timestamp, sourceIndex) {
      await fs.mkdir(outputDir, { recursive: true });

      const outputPath = path.join(outputDir, frameFileName(sourceIndex, timestamp));
      try {
        await execFileAsync(
          "ffmpeg",
          ["-y", "-ss", timestamp.toFixed(3), "-i", videoPath, "-frames:v", "1", "-q:v", String(qscale), outputPath],
          { timeout: timeoutMs, maxBuffer: 10 * 1024 * 1024 },
        );
        const stat = await fs.stat(outputPath);
        return stat.size > 0 ? outputPath : null;
      } catch (err) {
        log.debug({ videoPath, timestamp, err }, "Frame grab failed");
        return null;
      }
    },
  };
}
