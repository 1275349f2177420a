import {
  AuthError,
  NotFoundError,
  RateLimitError,
  ReviewBotError,
  TransientError,
} from "../utils/errors.js";

/**
 * Maps an Octokit failure onto the pipeline's error taxonomy.
 * Errors with a status the taxonomy does not cover are returned unchanged.
 */
export function toHostError(err: unknown, context: string): Error {
  if (err instanceof ReviewBotError) return err;

  const status = readStatus(err);
  const message = `${context}: ${err instanceof Error ? err.message : String(err)}`;

  if (status === undefined || status >= 500) {
    return new TransientError(message, { cause: err });
  }

  if (status === 429 || (status === 403 && isThrottled(err))) {
    return new RateLimitError(message, { cause: err, retryAfterMs: retryAfterMs(err) });
  }

  switch (status) {
    case 401:
    case 403:
      return new AuthError(message, { cause: err });
    case 404:
    case 410:
      return new NotFoundError(message, { cause: err });
    default:
      return err instanceof Error ? err : new Error(message);
  }
}

function isThrottled(err: unknown): boolean {
  return (
    readHeader(err, "x-ratelimit-remaining") === "0" ||
    readHeader(err, "retry-after") !== undefined
  );
}

function retryAfterMs(err: unknown): number | undefined {
  const retryAfter = Number(readHeader(err, "retry-after"));
  if (Number.isFinite(retryAfter) && retryAfter >= 0) return retryAfter * 1000;

  // Primary rate limit: wait until the window resets
  const reset = Number(readHeader(err, "x-ratelimit-reset"));
  if (Number.isFinite(reset) && reset > 0) {
    return Math.max(0, reset * 1000 - Date.now());
  }
  return undefined;
}

/** HTTP status of an Octokit failure, if the host answered at all */
export function readStatus(err: unknown): number | undefined {
  if (
    typeof err === "object" &&
    err !== null &&
    "status" in err &&
    typeof err.status === "number"
  ) {
    return err.status;
  }
  return undefined;
}

function readHeader(err: unknown, name: string): string | undefined {
  if (typeof err !== "object" || err === null || !("response" in err)) {
    return undefined;
  }
  const response = err.response;
  if (typeof response !== "object" || response === null || !("headers" in response)) {
    return undefined;
  }
  const headers = response.headers;
  if (typeof headers !== "object" || headers === null) return undefined;

  const value: unknown = Reflect.get(headers, name);
  return typeof value === "string" || typeof value === "number"
    ? String(value)
    : undefined;
}
