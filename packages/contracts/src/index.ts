import { z } from "zod";

export const SecondsSchema = z.number().finite().nonnegative();
export type Seconds = z.infer<typeof SecondsSchema>;

// ─── Transcript ──────────────────────────────────────────────────────────────

export const SegmentSchema = z
  .object({
    start: SecondsSchema,
    end: SecondsSchema,
    text: z.string().min(1),
  })
  .refine((s) => s.end >= s.start, { message: "end must not precede start", path: ["end"] });
export type Segment = Readonly<z.infer<typeof SegmentSchema>>;

// Raw output of a speech-to-text collaborator, before normalization.
export const RawSegmentSchema = z.object({
  start: z.number().finite(),
  end: z.number().finite(),
  text: z.string(),
});
export type RawSegment = z.infer<typeof RawSegmentSchema>;

// ─── Configuration ───────────────────────────────────────────────────────────

export const DigestConfigSchema = z.object({
  mergeWindowSeconds: z.number().positive().default(60),
  maxTranscriptChars: z.number().int().min(1).default(60_000),
  lineOverheadChars: z.number().int().nonnegative().default(12),
  maxFrames: z.number().int().min(0).max(500).default(12),
  candidateMultiplier: z.number().int().min(1).max(20).default(3),
  dedupThreshold: z.number().int().min(0).max(64).default(8),
  maxImagesPerCall: z.number().int().min(0).max(50).default(4),
  outputLanguage: z.string().min(1).default("English"),
  keyMoments: z.boolean().default(true),
  diagram: z.boolean().default(true),
  maxKeyPoints: z.number().int().min(1).default(10),
  keyPointPrefixLength: z.number().int().min(1).default(60),
});
export type DigestConfig = z.infer<typeof DigestConfigSchema>;

// ─── Model responses ─────────────────────────────────────────────────────────
// Model output is untrusted: every field falls back to an empty value instead of failing.

export const DigestChapterSchema = z.object({
  title: z.string().catch(""),
  timestamp: z.string().catch(""),
  start_seconds: z.coerce.number().finite().nonnegative().catch(0),
  summary: z.string().catch(""),
});
export type DigestChapter = z.infer<typeof DigestChapterSchema>;

export const DigestResponseSchema = z.object({
  overview: z.string().catch(""),
  key_points: z
    .array(z.unknown())
    .catch([])
    .transform((items) => items.filter((p): p is string => typeof p === "string" && p.trim().length > 0)),
  chapters: z
    .array(DigestChapterSchema.nullable().catch(null))
    .catch([])
    .transform((items) => items.filter((c): c is DigestChapter => c !== null)),
});
export type DigestResponse = z.infer<typeof DigestResponseSchema>;

export const KeyMomentSchema = z.object({
  seconds: z.coerce.number().finite().nonnegative(),
  label: z.string().catch(""),
});
export type KeyMoment = z.infer<typeof KeyMomentSchema>;

export const KeyMomentsResponseSchema = z.object({
  key_moments: z
    .array(KeyMomentSchema.nullable().catch(null))
    .catch([])
    .transform((items) => items.filter((m): m is KeyMoment => m !== null)),
});
export type KeyMomentsResponse = z.infer<typeof KeyMomentsResponseSchema>;

export const DiagramNodeTypeSchema = z.enum(["core", "phase", "insight"]);
export type DiagramNodeType = z.infer<typeof DiagramNodeTypeSchema>;

export const DiagramSchema = z.object({
  nodes: z
    .array(
      z.object({
        id: z.string().min(1),
        label: z.string().min(1),
        type: DiagramNodeTypeSchema,
      }),
    )
    .min(1),
  edges: z.array(
    z.object({
      from: z.string().min(1),
      to: z.string().min(1),
    }),
  ),
});
export type Diagram = z.infer<typeof DiagramSchema>;

// ─── Pipeline events ─────────────────────────────────────────────────────────

export const PipelineStageSchema = z.enum(["transcript", "merge", "key_moments", "frames", "analysis", "diagram"]);
export type PipelineStage = z.infer<typeof PipelineStageSchema>;

export const PipelineEventStatusSchema = z.enum(["started", "finished", "failed", "skipped"]);
export type PipelineEventStatus = z.infer<typeof PipelineEventStatusSchema>;

export const PipelineEventSchema = z.object({
  stage: PipelineStageSchema,
  status: PipelineEventStatusSchema,
  message: z.string(),
  at: z.string().min(1),
});
export type PipelineEvent = z.infer<typeof PipelineEventSchema>;
