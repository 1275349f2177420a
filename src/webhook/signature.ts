import { Webhooks } from "@octokit/webhooks";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "webhook-signature" });

function toText(rawBody: Uint8Array | string): string {
  return typeof rawBody === "string" ? rawBody : Buffer.from(rawBody).toString("utf-8");
}

/** Header value GitHub sends in `x-hub-signature-256` for this body */
export function signPayload(rawBody: Uint8Array | string, secret: string): Promise<string> {
  return new Webhooks({ secret }).sign(toText(rawBody));
}

/**
 * Checks a webhook body against its `x-hub-signature-256` header.
 * Resolves false for a missing secret, body or header instead of rejecting.
 */
export async function verifySignature(
  rawBody: Uint8Array | string,
  signatureHeader: string | undefined,
  secret: string
): Promise<boolean> {
  if (!secret || !signatureHeader) return false;

  try {
    return await new Webhooks({ secret }).verify(toText(rawBody), signatureHeader);
  } catch (err) {
    log.debug({ err }, "Signature check rejected its input");
    return false;
  }
}
