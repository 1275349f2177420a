import { Hono } from "hono";
import { createWebhookRouter, type WebhookRouterDeps } from "./webhook/handler.js";

export const VERSION = "0.1.0";

export function createApp(deps: WebhookRouterDeps): Hono {
  const app = new Hono();

  app.get("/health", (c) =>
    c.json({ status: "ok", version: VERSION, timestamp: new Date().toISOString() })
  );

  app.route("/webhook", createWebhookRouter(deps));

  return app;
}
