import { getLogger } from "./logger.js";

export interface RetryOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  retryOn?: (error: unknown) => boolean;
  /** Host-provided wait (e.g. Retry-After) that replaces the computed backoff */
  delayHintMs?: (error: unknown) => number | undefined;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  opts: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = 3,
    baseDelayMs = 1000,
    maxDelayMs = 30000,
    retryOn = () => true,
    delayHintMs,
    onRetry,
  } = opts;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      if (attempt >= maxAttempts || !retryOn(error)) throw error;

      const hint = delayHintMs?.(error);
      const delay =
        hint !== undefined
          ? Math.min(hint, maxDelayMs)
          : jittered(Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs));

      if (onRetry) {
        onRetry({ attempt, delayMs: delay, error });
      } else {
        getLogger().warn({ attempt, maxAttempts, delayMs: delay }, "Retrying after error");
      }
      if (delay > 0) await sleep(delay);
    }
  }
  throw new Error("withRetry called with maxAttempts < 1");
}

function jittered(delay: number): number {
  return Math.round(delay * (0.5 + Math.random() * 0.5));
}

function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}
