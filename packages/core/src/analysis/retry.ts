import { setTimeout as sleep } from "node:timers/promises";
import { isDigestError } from "../errors";

/**
 * Caller-side retry for analysis calls. A call is the analyzer completion plus
 * JSON repair, so an unrepairable response can be retried like a transport error.
 */
export interface RetryPolicy {
  /** Attempts after the first one (default 2) */
  retries?: number;
  /** Delay before the first retry; doubles on each further retry (default 500) */
  baseDelayMs?: number;
  /** Upper bound for a single delay (default 8000) */
  maxDelayMs?: number;
  /** Retry responses that stay malformed after repair (default false) */
  retryMalformed?: boolean;
  onRetry?: (info: RetryInfo) => void;
}

export interface RetryInfo {
  /** 1-based number of the retry about to run */
  attempt: number;
  delayMs: number;
  error: Error;
}

const TRANSIENT_CODES = new Set(["ECONNRESET", "ECONNREFUSED", "ETIMEDOUT", "EPIPE", "EAI_AGAIN", "UND_ERR_SOCKET"]);
const TRANSIENT_MESSAGE_RE = /rate limit|too many requests|overloaded|socket hang up|fetch failed/i;

function httpStatus(err: Error): number | null {
  if ("status" in err && typeof err.status === "number") return err.status;
  if ("statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
  const m = /\b(429|5\d\d)\b/.exec(err.message);
  return m ? Number(m[1]) : null;
}

export function isRetryableAnalysisError(err: unknown, policy?: Pick<RetryPolicy, "retryMalformed">): boolean {
  if (isDigestError(err)) return err.code === "MALFORMED_RESPONSE" && policy?.retryMalformed === true;
  if (!(err instanceof Error)) return false;

  const status = httpStatus(err);
  if (status !== null) return status === 429 || (status >= 500 && status < 600);
  if ("code" in err && typeof err.code === "string" && TRANSIENT_CODES.has(err.code)) return true;
  return TRANSIENT_MESSAGE_RE.test(err.message);
}

export function retryDelayMs(attempt: number, policy?: Pick<RetryPolicy, "baseDelayMs" | "maxDelayMs">): number {
  const base = Math.max(0, policy?.baseDelayMs ?? 500);
  const max = Math.max(0, policy?.maxDelayMs ?? 8000);
  return Math.min(max, base * 2 ** (attempt - 1));
}

export async function withAnalysisRetry<T>(fn: () => Promise<T>, policy?: RetryPolicy): Promise<T> {
  const retries = Math.max(0, policy?.retries ?? 2);
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (attempt > retries || !isRetryableAnalysisError(err, policy)) throw err;
      const delayMs = retryDelayMs(attempt, policy);
      policy?.onRetry?.({ attempt, delayMs, error: err instanceof Error ? err : new Error(String(err)) });
      await sleep(delayMs);
    }
  }
}
