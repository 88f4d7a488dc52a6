import type { DigestConfig, Diagram, RawSegment, Segment } from "@vdigest/contracts";
import { analyzeTranscript, requestDiagram, requestKeyMoments } from "../analysis/analyze";
import type { RetryPolicy } from "../analysis/retry";
import type { ContentAnalyzer } from "../analysis/types";
import { loadDigestConfig, type LoadDigestConfigOpts } from "../config/defaults";
import { EmptyTranscriptError } from "../errors";
import { selectKeyFrames, selectKeyFramesAtTimestamps, type KeyFrame } from "../frames/dedup";
import type { FrameGrabber } from "../frames/grab";
import type { FrameHasher } from "../frames/hash";
import { logger as rootLogger, type Logger } from "../logger";
import { mergeSegments } from "../text/merge";
import { normalizeAsrSegments } from "../text/normalize";
import { parseSubtitleBlocks } from "../text/subtitles";
import { assignChapterFrames, type ChapterWithFrame } from "./chapters";
import { createLoggingSink, emit, runStage, type PipelineEventSink } from "./events";

export interface FrameSource {
  grabber: FrameGrabber;
  hasher?: FrameHasher;
  /** Releases images discarded as duplicates (default: delete the file) */
  release?: (imagePath: string) => Promise<void>;
}

export interface BuildDigestOpts {
  title: string;
  /** Caption file contents (SRT or WebVTT) */
  captions?: string | Uint8Array | null;
  /** Speech-to-text fallback, only called when captions yield no segments */
  transcribe?: () => Promise<RawSegment[]>;
  /** Omit to produce a text-only digest */
  frames?: FrameSource | null;
  analyzer: ContentAnalyzer;
  config?: Partial<DigestConfig>;
  /** Where unset config values are read from (default process.env and .env files above the cwd) */
  configSource?: LoadDigestConfigOpts;
  /** Retry policy applied to every analysis call; omit to call once */
  retry?: RetryPolicy;
  onEvent?: PipelineEventSink;
  logger?: Logger;
}

export interface Digest {
  title: string;
  overview: string;
  keyPoints: string[];
  chapters: ChapterWithFrame[];
  frames: KeyFrame[];
  diagram: Diagram | null;
  /** Transcript segments before merging */
  segmentCount: number;
  /** Segments after merging into duration-bounded chunks */
  mergedCount: number;
}

async function loadTranscript(opts: BuildDigestOpts, log: Logger): Promise<Segment[]> {
  if (opts.captions) {
    const { segments, skippedBlocks } = parseSubtitleBlocks(opts.captions);
    log.debug({ segments: segments.length, skippedBlocks }, "Parsed captions");
    if (segments.length > 0) return segments;
  }
  if (opts.transcribe) {
    const segments = normalizeAsrSegments(await opts.transcribe());
    if (segments.length > 0) return segments;
  }
  throw new EmptyTranscriptError(
    opts.captions || opts.transcribe
      ? "Captions and speech-to-text produced no transcript segments"
      : "No caption text or speech-to-text source supplied",
  );
}

/**
 * Full digest: transcript → merged chunks → key frames → batched analysis →
 * reconciled chapters/overview → optional diagram.
 *
 * Frames, key moments and the diagram are enrichment: their failures are logged and
 * skipped. An empty transcript or an unparseable analysis response fails the digest.
 */
export async function buildDigest(opts: BuildDigestOpts): Promise<Digest> {
  const log = opts.logger ?? rootLogger;
  const sink = opts.onEvent ?? createLoggingSink(log);
  const config = loadDigestConfig(opts.config, opts.configSource);
  const { analyzer, retry } = opts;

  const segments = await runStage(
    sink,
    "transcript",
    "Loading transcript",
    () => loadTranscript(opts, log),
    (s) => `Loaded ${s.length} transcript segments`,
  );

  const merged = await runStage(
    sink,
    "merge",
    `Merging segments into ${config.mergeWindowSeconds}s chunks`,
    async () => mergeSegments(segments, config.mergeWindowSeconds),
    (m) => `Merged ${segments.length} segments into ${m.length} chunks`,
  );

  const frames = await collectFrames(opts.frames ?? null, merged, { analyzer, retry, title: opts.title }, config, sink, log);

  const response = await runStage(
    sink,
    "analysis",
    `Analyzing transcript (${config.outputLanguage})`,
    () =>
      analyzeTranscript({
        analyzer,
        title: opts.title,
        segments: merged,
        frames,
        language: config.outputLanguage,
        maxChars: config.maxTranscriptChars,
        lineOverhead: config.lineOverheadChars,
        maxImagesPerCall: config.maxImagesPerCall,
        maxKeyPoints: config.maxKeyPoints,
        keyPointPrefixLength: config.keyPointPrefixLength,
        retry,
        logger: log,
      }),
    (r) => `Analysis complete: ${r.chapters.length} chapters, ${r.key_points.length} key points`,
  );

  let diagram: Diagram | null = null;
  if (config.diagram && response.chapters.length > 0) {
    try {
      diagram = await runStage(
        sink,
        "diagram",
        "Building knowledge diagram",
        () =>
          requestDiagram({
            analyzer,
            title: opts.title,
            overview: response.overview,
            chapterTitles: response.chapters.map((c) => c.title),
            language: config.outputLanguage,
            retry,
            logger: log,
          }),
        (d) => (d ? `Diagram with ${d.nodes.length} nodes` : "Diagram response unusable"),
      );
    } catch (err) {
      log.warn({ err }, "Diagram generation failed; continuing without it");
    }
  } else {
    emit(sink, "diagram", "skipped", config.diagram ? "No chapters to diagram" : "Diagram disabled");
  }

  return {
    title: opts.title,
    overview: response.overview,
    keyPoints: response.key_points,
    chapters: assignChapterFrames(response.chapters, frames),
    frames,
    diagram,
    segmentCount: segments.length,
    mergedCount: merged.length,
  };
}

async function collectFrames(
  source: FrameSource | null,
  merged: Segment[],
  call: { analyzer: ContentAnalyzer; retry?: RetryPolicy; title: string },
  config: DigestConfig,
  sink: PipelineEventSink,
  log: Logger,
): Promise<KeyFrame[]> {
  if (!source || config.maxFrames === 0) {
    emit(sink, "frames", "skipped", source ? "Frame extraction disabled (maxFrames=0)" : "No video supplied");
    return [];
  }

  let moments: number[] = [];
  if (config.keyMoments) {
    try {
      moments = await runStage(
        sink,
        "key_moments",
        `Locating ${config.maxFrames} key moments`,
        () =>
          requestKeyMoments({
            ...call,
            segments: merged,
            count: config.maxFrames,
            maxChars: config.maxTranscriptChars,
          }),
        (m) => `Found ${m.length} key moments`,
      );
    } catch (err) {
      log.warn({ err }, "Key-moment pass failed; sampling frames uniformly");
    }
  }

  const dedup = {
    grabber: source.grabber,
    hasher: source.hasher,
    release: source.release,
    threshold: config.dedupThreshold,
    logger: log,
  };

  try {
    return await runStage(
      sink,
      "frames",
      moments.length > 0
        ? `Extracting frames at ${Math.min(moments.length, config.maxFrames)} key moments`
        : `Extracting up to ${config.maxFrames} key frames`,
      () =>
        moments.length > 0
          ? selectKeyFramesAtTimestamps({ ...dedup, timestamps: moments.slice(0, config.maxFrames) })
          : selectKeyFrames({
              ...dedup,
              segments: merged,
              maxFrames: config.maxFrames,
              candidateMultiplier: config.candidateMultiplier,
            }),
      (f) => `Kept ${f.length} distinct frames`,
    );
  } catch (err) {
    log.warn({ err }, "Frame extraction failed; continuing text-only");
    return [];
  }
}
