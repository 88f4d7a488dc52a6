import client from "prom-client";

export type FrameOutcome = "kept" | "duplicate" | "grab_failed" | "unhashed";

export type Metrics = {
  register: client.Registry;
  stageDurationMs: client.Histogram<"stage" | "status">;
  framesTotal: client.Counter<"outcome">;
  analysisCallsTotal: client.Counter<"kind" | "status">;
};

declare global {
  var __vdigest_metrics__: Metrics | undefined;
}

export function initMetrics(): Metrics {
  if (globalThis.__vdigest_metrics__) return globalThis.__vdigest_metrics__;

  const register = new client.Registry();

  const stageDurationMs = new client.Histogram({
    name: "vdigest_stage_duration_ms",
    help: "Digest pipeline stage duration in ms",
    labelNames: ["stage", "status"] as const,
    buckets: [5, 25, 100, 250, 1_000, 5_000, 15_000, 60_000, 180_000, 600_000],
    registers: [register],
  });

  const framesTotal = new client.Counter({
    name: "vdigest_frames_total",
    help: "Candidate frames by dedup outcome",
    labelNames: ["outcome"] as const,
    registers: [register],
  });

  const analysisCallsTotal = new client.Counter({
    name: "vdigest_analysis_calls_total",
    help: "Content-analysis calls",
    labelNames: ["kind", "status"] as const,
    registers: [register],
  });

  const m = { register, stageDurationMs, framesTotal, analysisCallsTotal };
  globalThis.__vdigest_metrics__ = m;
  return m;
}
