export * from "./logger";
export * from "./errors";
export * from "./config/defaults";
export * from "./metrics/metrics";

export * from "./text/segment";
export * from "./text/subtitles";
export * from "./text/normalize";
export * from "./text/merge";
export * from "./text/chunk";

export * from "./frames/sample";
export * from "./frames/hash";
export * from "./frames/grab";
export * from "./frames/dedup";

export type * from "./analysis/types";
export * from "./analysis/repair";
export * from "./analysis/reconcile";
export * from "./analysis/prompt";
export * from "./analysis/batches";
export * from "./analysis/retry";
export * from "./analysis/analyze";

export * from "./pipeline/events";
export * from "./pipeline/chapters";
export * from "./pipeline/digest";
