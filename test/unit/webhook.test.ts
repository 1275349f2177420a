import { describe, it, expect, vi } from "vitest";
import { createApp } from "../../src/app.js";
import { InstallationTokenCache } from "../../src/github/token-cache.js";
import { ReviewOrchestrator } from "../../src/review/orchestrator.js";
import type {
  DiffBundle,
  InstallationToken,
  PullRequestRef,
} from "../../src/review/types.js";
import { RateLimitError } from "../../src/utils/errors.js";
import { signPayload } from "../../src/webhook/signature.js";
import {
  makeDiff,
  makeFile,
  pullRequestPayload,
  TEST_SECRET,
} from "../fixtures/webhook.js";

function setup() {
  const exchange = vi.fn(async (installationId: number): Promise<InstallationToken> => ({
    installationId,
    token: `tok-${installationId}`,
    expiresAt: new Date(Date.now() + 60 * 60 * 1000),
  }));
  const tokens = new InstallationTokenCache(exchange, { safetyMarginMs: 60_000 });

  const fetchDiff = vi.fn(async (_token: InstallationToken, pr: PullRequestRef) =>
    makeDiff([makeFile()], pr.headSha)
  );
  const generateReview = vi.fn(async (_diff: DiffBundle) => "Looks good.");
  const publish = vi.fn(async (_token: InstallationToken, _pr: PullRequestRef, _body: string) => 555);

  const orchestrator = new ReviewOrchestrator(
    {
      getToken: (id) => tokens.getToken(id),
      invalidateToken: (id) => tokens.invalidate(id),
      fetchDiff,
      generateReview,
      publish,
    },
    { retry: { transientAttempts: 3, generationAttempts: 2, baseDelayMs: 0, maxDelayMs: 0 } }
  );
  const app = createApp({ secret: TEST_SECRET, orchestrator });

  return { app, orchestrator, exchange, fetchDiff, generateReview, publish };
}

async function deliver(
  app: ReturnType<typeof createApp>,
  body: string,
  opts: { event?: string; delivery?: string; signature?: string } = {}
) {
  return app.request("/webhook", {
    method: "POST",
    body,
    headers: {
      "content-type": "application/json",
      "x-github-event": opts.event ?? "pull_request",
      "x-github-delivery": opts.delivery ?? "delivery-1",
      "x-hub-signature-256": opts.signature ?? (await signPayload(body, TEST_SECRET)),
    },
  });
}

describe("POST /webhook", () => {
  it("reviews an opened PR and posts exactly one comment", async () => {
    const { app, orchestrator, exchange, fetchDiff, generateReview, publish } = setup();
    const body = JSON.stringify(
      pullRequestPayload({ action: "opened", installationId: 42, repo: "o/r", pullNumber: 7, headSha: "abc" })
    );

    const res = await deliver(app, body);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "accepted" });
    await orchestrator.drain();

    expect(exchange).toHaveBeenCalledTimes(1);
    expect(exchange).toHaveBeenCalledWith(42);
    expect(fetchDiff).toHaveBeenCalledWith(
      expect.objectContaining({ token: "tok-42" }),
      expect.objectContaining({ repoFullName: "o/r", owner: "o", repo: "r", pullNumber: 7, headSha: "abc" })
    );
    expect(generateReview).toHaveBeenCalledTimes(1);
    expect(publish).toHaveBeenCalledTimes(1);
    expect(publish).toHaveBeenCalledWith(
      expect.objectContaining({ token: "tok-42" }),
      expect.objectContaining({ pullNumber: 7 }),
      "Looks good."
    );
  });

  it("posts one comment when the same event is delivered twice", async () => {
    const { app, orchestrator, publish } = setup();
    const body = JSON.stringify(pullRequestPayload());

    const first = await deliver(app, body, { delivery: "delivery-1" });
    const second = await deliver(app, body, { delivery: "delivery-2" });
    await orchestrator.drain();
    const late = await deliver(app, body, { delivery: "delivery-1" });
    await orchestrator.drain();

    expect(await first.json()).toEqual({ status: "accepted" });
    expect(await second.json()).toEqual({ status: "duplicate" });
    expect(await late.json()).toEqual({ status: "duplicate" });
    expect(publish).toHaveBeenCalledTimes(1);
  });

  it("rejects a bad signature with 401 and makes no downstream call", async () => {
    const { app, orchestrator, exchange, fetchDiff, generateReview, publish } = setup();
    const body = JSON.stringify(pullRequestPayload());

    const res = await deliver(app, body, { signature: await signPayload(body, "wrong-secret") });
    await orchestrator.drain();

    expect(res.status).toBe(401);
    expect(orchestrator.pending).toBe(0);
    expect(exchange).not.toHaveBeenCalled();
    expect(fetchDiff).not.toHaveBeenCalled();
    expect(generateReview).not.toHaveBeenCalled();
    expect(publish).not.toHaveBeenCalled();
  });

  it("rejects an unsigned delivery with 401", async () => {
    const { app } = setup();
    const res = await app.request("/webhook", {
      method: "POST",
      body: JSON.stringify(pullRequestPayload()),
      headers: { "x-github-event": "pull_request" },
    });

    expect(res.status).toBe(401);
  });

  it("drops the event after rate limiting exhausts the retry budget", async () => {
    const { app, orchestrator, fetchDiff, publish } = setup();
    fetchDiff.mockRejectedValue(new RateLimitError("API rate limit exceeded"));

    const res = await deliver(app, JSON.stringify(pullRequestPayload()));
    await orchestrator.drain();

    expect(res.status).toBe(200);
    expect(fetchDiff).toHaveBeenCalledTimes(3);
    expect(publish).not.toHaveBeenCalled();
    expect(orchestrator.getState("o/r", 7)).toMatchObject({ state: "idle", lastOutcome: "failed" });
  });

  it("returns 400 for a signed body that is not JSON", async () => {
    const { app } = setup();

    const res = await deliver(app, "{not json");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "malformed JSON" });
  });

  it("returns 400 when the installation id is missing", async () => {
    const { app, exchange } = setup();
    const { installation: _installation, ...payload } = pullRequestPayload();

    const res = await deliver(app, JSON.stringify(payload));

    expect(res.status).toBe(400);
    expect(exchange).not.toHaveBeenCalled();
  });

  it("acknowledges events other than pull_request without processing", async () => {
    const { app, orchestrator } = setup();

    const res = await deliver(app, JSON.stringify({ zen: "Keep it logically awesome." }), {
      event: "ping",
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ignored" });
    expect(orchestrator.pending).toBe(0);
  });

  it("acknowledges non-reviewable PR actions without processing", async () => {
    const { app, exchange } = setup();

    const res = await deliver(app, JSON.stringify(pullRequestPayload({ action: "closed" })));

    expect(await res.json()).toEqual({ status: "ignored" });
    expect(exchange).not.toHaveBeenCalled();
  });
});

describe("GET /health", () => {
  it("reports ok", async () => {
    const { app } = setup();

    const res = await app.request("/health");

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: "ok", version: "0.1.0" });
  });
});
