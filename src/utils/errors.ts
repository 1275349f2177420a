/** Base class for every failure the review pipeline knows how to classify */
export class ReviewBotError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad credentials, rejected token, or a signing failure. Never retried. */
export class AuthError extends ReviewBotError {}

/** The PR or repository is gone. Never retried. */
export class NotFoundError extends ReviewBotError {}

/** The host asked us to slow down */
export class RateLimitError extends ReviewBotError {
  readonly retryAfterMs?: number;

  constructor(
    message: string,
    options?: { cause?: unknown; retryAfterMs?: number }
  ) {
    super(message, options);
    this.retryAfterMs = options?.retryAfterMs;
  }
}

/** The model call failed or produced nothing usable */
export class GenerationError extends ReviewBotError {}

/** Network failure, timeout, or a 5xx from the host */
export class TransientError extends ReviewBotError {}

export function isRetryable(err: unknown): boolean {
  return err instanceof RateLimitError || err instanceof TransientError;
}

export function errorKind(err: unknown): string {
  return err instanceof ReviewBotError ? err.name : "UnexpectedError";
}
