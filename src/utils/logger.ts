import pino from "pino";
import { errorKind } from "./errors.js";

let _logger: pino.Logger | null = null;

/**
 * pino's error serializer plus the pipeline error kind, so failures can be
 * filtered by class without parsing messages. Non-errors pass through.
 */
export function serializeError(err: unknown): unknown {
  if (!(err instanceof Error)) return err;
  return { ...pino.stdSerializers.err(err), kind: errorKind(err) };
}

export function getLogger(): pino.Logger {
  if (_logger) return _logger;
  _logger = pino({
    name: "pr-review-bot",
    level: process.env.LOG_LEVEL ?? "info",
    // Installation tokens and JWTs must never reach the log sink
    redact: ["token", "*.token", "jwt", "headers.authorization"],
    serializers: { err: serializeError },
    transport:
      process.env.NODE_ENV === "development"
        ? { target: "pino/file", options: { destination: 1 } }
        : undefined,
  });
  return _logger;
}

export function createChildLogger(
  bindings: Record<string, unknown>
): pino.Logger {
  return getLogger().child(bindings);
}
