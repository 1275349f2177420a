import { z } from "zod";
import type { PullRequestEventType, WebhookEvent } from "../review/types.js";

const pullRequestPayloadSchema = z.object({
  action: z.string(),
  installation: z.object({ id: z.number().int().positive() }),
  repository: z.object({
    full_name: z.string().regex(/^[^/\s]+\/[^/\s]+$/),
  }),
  pull_request: z.object({
    number: z.number().int().positive(),
    head: z.object({ sha: z.string().min(1) }),
  }),
});

export type PullRequestPayload = z.infer<typeof pullRequestPayloadSchema>;

export type ParseResult =
  | { ok: true; event: WebhookEvent }
  | { ok: false; error: string };

export function classifyAction(action: string): PullRequestEventType {
  switch (action) {
    case "opened":
      return "opened";
    case "synchronize":
      return "synchronize";
    default:
      return "other";
  }
}

/** Builds a WebhookEvent from an already-verified `pull_request` delivery */
export function parsePullRequestEvent(
  payload: unknown,
  delivery: { deliveryId: string; rawBody: Uint8Array; signatureHeader: string }
): ParseResult {
  const result = pullRequestPayloadSchema.safeParse(payload);
  if (!result.success) {
    return {
      ok: false,
      error: result.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("; "),
    };
  }

  const { action, installation, repository, pull_request: pr } = result.data;
  const [owner, repo] = repository.full_name.split("/");

  return {
    ok: true,
    event: Object.freeze({
      deliveryId: delivery.deliveryId,
      eventType: classifyAction(action),
      action,
      installationId: installation.id,
      repoFullName: repository.full_name,
      owner,
      repo,
      pullNumber: pr.number,
      headSha: pr.head.sha,
      rawBody: delivery.rawBody,
      signatureHeader: delivery.signatureHeader,
    }),
  };
}
