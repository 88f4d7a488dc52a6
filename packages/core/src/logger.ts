import pino, { type Logger } from "pino";

export type { Logger };

export const logger: Logger = pino({
  name: "video-digest",
  level: process.env.LOG_LEVEL?.trim() || "info",
});
