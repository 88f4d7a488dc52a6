import {
  DiagramSchema,
  KeyMomentsResponseSchema,
  type Diagram,
  type DigestResponse,
  type Segment,
} from "@vdigest/contracts";
import { logger as rootLogger, type Logger } from "../logger";
import { initMetrics } from "../metrics/metrics";
import { segmentsToText } from "../text/segment";
import type { KeyFrame } from "../frames/dedup";
import { buildAnalysisBatches } from "./batches";
import {
  DIAGRAM_SYSTEM,
  DIGEST_SYSTEM,
  KEY_MOMENTS_SYSTEM,
  buildDiagramPrompt,
  buildDigestPrompt,
  buildKeyMomentsPrompt,
} from "./prompt";
import { mergeChunkResults, toDigestResponse } from "./reconcile";
import { parseModelJson } from "./repair";
import { withAnalysisRetry, type RetryPolicy } from "./retry";
import type { AnalysisRequest, ContentAnalyzer } from "./types";

type CallKind = "digest" | "key_moments" | "diagram";

async function callJson(
  analyzer: ContentAnalyzer,
  kind: CallKind,
  req: AnalysisRequest,
  retry?: RetryPolicy,
): Promise<Record<string, unknown>> {
  const metrics = initMetrics();
  const once = async () => {
    try {
      const parsed = parseModelJson(await analyzer.complete(req));
      metrics.analysisCallsTotal.inc({ kind, status: "ok" });
      return parsed;
    } catch (err) {
      metrics.analysisCallsTotal.inc({ kind, status: "error" });
      throw err;
    }
  };
  if (!retry) return once();

  return withAnalysisRetry(once, {
    ...retry,
    onRetry: (info) => {
      metrics.analysisCallsTotal.inc({ kind, status: "retried" });
      retry.onRetry?.(info);
    },
  });
}

export interface AnalyzeTranscriptOpts {
  analyzer: ContentAnalyzer;
  title: string;
  segments: readonly Segment[];
  frames?: readonly KeyFrame[];
  language?: string;
  maxChars?: number;
  lineOverhead?: number;
  maxImagesPerCall?: number;
  maxKeyPoints?: number;
  keyPointPrefixLength?: number;
  maxTokens?: number;
  /** Retry policy for each batch call; omit to call once */
  retry?: RetryPolicy;
  /** Progress callback, called after each batch */
  onProgress?: (completed: number, total: number) => void;
  logger?: Logger;
}

/**
 * Analyze the transcript in character-bounded batches (each with the frames in its
 * time span), then reconcile the per-batch results into one response.
 */
export async function analyzeTranscript(opts: AnalyzeTranscriptOpts): Promise<DigestResponse> {
  const log = opts.logger ?? rootLogger;
  const batches = buildAnalysisBatches(opts.segments, opts.frames ?? [], {
    maxChars: opts.maxChars,
    lineOverhead: opts.lineOverhead,
    maxImagesPerCall: opts.maxImagesPerCall,
  });

  const results: Record<string, unknown>[] = [];
  for (const batch of batches) {
    const prompt = buildDigestPrompt({
      title: opts.title,
      transcript: segmentsToText(batch.segments),
      language: opts.language ?? "English",
      imageCount: batch.frames.length,
      part: { index: batch.index + 1, total: batches.length },
    });
    log.debug({ batch: batch.index, segments: batch.segments.length, images: batch.frames.length }, "Analyzing batch");

    const req: AnalysisRequest = {
      system: DIGEST_SYSTEM,
      prompt,
      images: batch.frames.map((f) => ({ path: f.imagePath, mimeType: "image/jpeg" as const, timestamp: f.timestamp })),
      maxTokens: opts.maxTokens ?? 4096,
    };
    results.push(await callJson(opts.analyzer, "digest", req, opts.retry));
    opts.onProgress?.(results.length, batches.length);
  }

  const merged = mergeChunkResults(results, {
    maxListItems: opts.maxKeyPoints,
    keyPrefixLength: opts.keyPointPrefixLength,
  });
  return toDigestResponse(merged);
}

export interface RequestKeyMomentsOpts {
  analyzer: ContentAnalyzer;
  title: string;
  segments: readonly Segment[];
  count: number;
  /** Transcript is cut to this many characters (default 60000) */
  maxChars?: number;
  retry?: RetryPolicy;
}

/** Ask for content-transition instants; returns seconds in ascending order. */
export async function requestKeyMoments(opts: RequestKeyMomentsOpts): Promise<number[]> {
  let transcript = segmentsToText(opts.segments);
  const maxChars = opts.maxChars ?? 60_000;
  if (transcript.length > maxChars) transcript = transcript.slice(0, maxChars);

  const req: AnalysisRequest = {
    system: KEY_MOMENTS_SYSTEM,
    prompt: buildKeyMomentsPrompt({ title: opts.title, transcript, count: opts.count }),
    images: [],
    maxTokens: 512,
  };
  const raw = await callJson(opts.analyzer, "key_moments", req, opts.retry);

  return KeyMomentsResponseSchema.parse(raw)
    .key_moments.map((m) => m.seconds)
    .sort((a, b) => a - b);
}

export interface RequestDiagramOpts {
  analyzer: ContentAnalyzer;
  title: string;
  overview: string;
  chapterTitles: string[];
  language?: string;
  retry?: RetryPolicy;
  logger?: Logger;
}

/** Knowledge-graph pass. Returns null when the model output is not a usable diagram. */
export async function requestDiagram(opts: RequestDiagramOpts): Promise<Diagram | null> {
  const log = opts.logger ?? rootLogger;
  const req: AnalysisRequest = {
    system: DIAGRAM_SYSTEM,
    prompt: buildDiagramPrompt({
      title: opts.title,
      overview: opts.overview,
      chapterTitles: opts.chapterTitles,
      language: opts.language ?? "English",
    }),
    images: [],
    maxTokens: 1024,
  };
  const raw = await callJson(opts.analyzer, "diagram", req, opts.retry);

  const parsed = DiagramSchema.safeParse(raw);
  if (!parsed.success) {
    log.warn({ issues: parsed.error.issues.length }, "Diagram response did not match the expected shape");
    return null;
  }
  return parsed.data;
}
