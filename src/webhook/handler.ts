import { Hono } from "hono";
import type { ReviewOrchestrator } from "../review/orchestrator.js";
import { createChildLogger } from "../utils/logger.js";
import { parsePullRequestEvent } from "./events.js";
import { verifySignature } from "./signature.js";

const log = createChildLogger({ module: "webhook-handler" });

export interface WebhookRouterDeps {
  secret: string;
  orchestrator: Pick<ReviewOrchestrator, "submit">;
}

export function createWebhookRouter({ secret, orchestrator }: WebhookRouterDeps): Hono {
  const app = new Hono();

  app.post("/", async (c) => {
    const id = c.req.header("x-github-delivery") ?? "";
    const name = c.req.header("x-github-event") ?? "";
    const signature = c.req.header("x-hub-signature-256") ?? "";
    const rawBody = Buffer.from(await c.req.arrayBuffer());

    log.debug({ id, event: name }, "Received webhook");

    // Nothing below runs for an unverified body
    if (!(await verifySignature(rawBody, signature, secret))) {
      log.warn({ id, event: name }, "Rejected webhook with invalid signature");
      return c.json({ error: "invalid signature" }, 401);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(rawBody.toString("utf-8"));
    } catch (err) {
      log.warn({ id, err }, "Webhook body is not valid JSON");
      return c.json({ error: "malformed JSON" }, 400);
    }

    if (name !== "pull_request") {
      log.debug({ id, event: name }, "Ignoring non pull_request event");
      return c.json({ status: "ignored" });
    }

    const parsed = parsePullRequestEvent(payload, {
      deliveryId: id,
      rawBody,
      signatureHeader: signature,
    });
    if (!parsed.ok) {
      log.warn({ id, error: parsed.error }, "Invalid pull_request payload");
      return c.json({ error: parsed.error }, 400);
    }

    // Review continues after the response is sent
    const outcome = orchestrator.submit(parsed.event);
    return c.json({ status: outcome.status });
  });

  return app;
}
