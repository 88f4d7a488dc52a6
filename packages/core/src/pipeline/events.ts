import type { PipelineEvent, PipelineEventStatus, PipelineStage } from "@vdigest/contracts";
import type { Logger } from "../logger";
import { initMetrics } from "../metrics/metrics";

/**
 * Receives stage progress. Transport (log, server-sent events, UI store) is up to the caller.
 */
export type PipelineEventSink = (event: PipelineEvent) => void;

export function createLoggingSink(logger: Logger): PipelineEventSink {
  return (event) => {
    const fields = { stage: event.stage, status: event.status };
    if (event.status === "failed") logger.error(fields, event.message);
    else if (event.status === "skipped") logger.warn(fields, event.message);
    else logger.info(fields, event.message);
  };
}

export function emit(sink: PipelineEventSink, stage: PipelineStage, status: PipelineEventStatus, message: string): void {
  sink({ stage, status, message, at: new Date().toISOString() });
}

/**
 * Run one stage: emits started, then finished (with a message built from the
 * result) or failed, and records the stage duration. Errors are rethrown.
 */
export async function runStage<T>(
  sink: PipelineEventSink,
  stage: PipelineStage,
  startMessage: string,
  fn: () => Promise<T>,
  finishMessage: (result: T) => string,
): Promise<T> {
  const metrics = initMetrics();
  const t0 = Date.now();
  emit(sink, stage, "started", startMessage);
  try {
    const result = await fn();
    metrics.stageDurationMs.observe({ stage, status: "finished" }, Date.now() - t0);
    emit(sink, stage, "finished", finishMessage(result));
    return result;
  } catch (err) {
    metrics.stageDurationMs.observe({ stage, status: "failed" }, Date.now() - t0);
    emit(sink, stage, "failed", err instanceof Error ? err.message : String(err));
    throw err;
  }
}
