import type pino from "pino";
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from "../config/defaults.js";
import {
  AuthError,
  GenerationError,
  NotFoundError,
  errorKind,
  isRetryable,
  RateLimitError,
} from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";
import { withRetry } from "../utils/retry.js";
import {
  PullRequestStateTable,
  pullRequestKey,
  type PullRequestEntry,
  type RunOutcome,
} from "./state.js";
import {
  toPullRequestRef,
  type DiffBundle,
  type InstallationToken,
  type PullRequestRef,
  type ReviewResult,
  type WebhookEvent,
} from "./types.js";

const baseLog = createChildLogger({ module: "orchestrator" });

/** The collaborators one review run calls, in order */
export interface ReviewPipeline {
  getToken(installationId: number): Promise<InstallationToken>;
  invalidateToken(installationId: number): void;
  fetchDiff(token: InstallationToken, pr: PullRequestRef): Promise<DiffBundle>;
  generateReview(diff: DiffBundle): Promise<string>;
  publish(token: InstallationToken, pr: PullRequestRef, body: string): Promise<number>;
}

export interface OrchestratorOptions {
  retry?: RetryPolicy;
  maxTrackedPullRequests?: number;
}

export type SubmitOutcome =
  | { status: "accepted"; runId: number; supersededSha?: string }
  | { status: "duplicate"; reason: "in-progress" | "already-reviewed" }
  | { status: "ignored"; reason: string };

/** Thrown inside a run once a newer head sha owns the PR */
class RunSuperseded extends Error {}

export class ReviewOrchestrator {
  private readonly states: PullRequestStateTable;
  private readonly inFlight = new Set<Promise<void>>();
  private readonly retry: RetryPolicy;

  constructor(
    private readonly pipeline: ReviewPipeline,
    options: OrchestratorOptions = {}
  ) {
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.states = new PullRequestStateTable(options.maxTrackedPullRequests);
  }

  /**
   * Accepts a verified event and starts its review as a detached task.
   * Returns before any network call is made.
   */
  submit(event: WebhookEvent): SubmitOutcome {
    const log = baseLog.child({
      deliveryId: event.deliveryId,
      repo: event.repoFullName,
      pr: event.pullNumber,
      sha: event.headSha,
    });

    if (event.eventType === "other") {
      log.debug({ action: event.action }, "Skipping non-reviewable PR action");
      return { status: "ignored", reason: `action ${event.action}` };
    }

    const key = pullRequestKey(event.repoFullName, event.pullNumber);
    const begin = this.states.begin(key, event.headSha);

    if (begin.kind === "duplicate") {
      log.info({ reason: begin.reason }, "Dropping duplicate delivery");
      return { status: "duplicate", reason: begin.reason };
    }

    if (begin.supersededSha) {
      log.info(
        { supersededSha: begin.supersededSha },
        "Newer head sha supersedes in-flight review"
      );
    }

    // Detached: the first pipeline call happens after submit() returns
    const task: Promise<void> = Promise.resolve()
      .then(() => this.run(event, key, begin.runId, log))
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);

    return { status: "accepted", runId: begin.runId, supersededSha: begin.supersededSha };
  }

  /** Resolves once every accepted review has finished */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  get pending(): number {
    return this.inFlight.size;
  }

  getState(repoFullName: string, pullNumber: number): Readonly<PullRequestEntry> | undefined {
    return this.states.get(pullRequestKey(repoFullName, pullNumber));
  }

  private async run(
    event: WebhookEvent,
    key: string,
    runId: number,
    parentLog: pino.Logger
  ): Promise<void> {
    const log = parentLog.child({ runId });
    const pr = toPullRequestRef(event);
    const startTime = Date.now();
    let outcome: RunOutcome;

    try {
      outcome = await this.review(pr, key, runId, log);
    } catch (err) {
      if (err instanceof RunSuperseded) {
        log.info("Discarding result of superseded review");
        return;
      }
      outcome = "failed";
      logFailure(log, err);
    }

    const finished = this.states.finish(key, runId, outcome);
    log.info(
      { outcome, durationMs: Date.now() - startTime, stateReset: finished },
      "Review run finished"
    );
  }

  private async review(
    pr: PullRequestRef,
    key: string,
    runId: number,
    log: pino.Logger
  ): Promise<RunOutcome> {
    // 1. Token + diff
    const diff = await this.withTransientRetry("fetch-diff", log, () =>
      this.withToken(pr, (token) => this.pipeline.fetchDiff(token, pr))
    );
    this.assertCurrent(key, runId);

    if (!diff.files.some((f) => f.patchText.length > 0)) {
      log.info({ fileCount: diff.files.length }, "No patch text in PR, nothing to review");
      return "skipped";
    }

    // 2. Generate
    const bodyText = await withRetry(() => this.pipeline.generateReview(diff), {
      maxAttempts: this.retry.generationAttempts,
      baseDelayMs: this.retry.baseDelayMs,
      maxDelayMs: this.retry.maxDelayMs,
      retryOn: (err) => err instanceof GenerationError,
      onRetry: ({ attempt, delayMs, error }) =>
        log.warn({ stage: "generate", attempt, delayMs, err: error }, "Retrying review generation"),
    });
    this.assertCurrent(key, runId);

    const result: ReviewResult = {
      pullNumber: pr.pullNumber,
      headSha: pr.headSha,
      bodyText,
      generatedAt: new Date(),
    };

    // 3. Publish, unless a newer sha took over before the call starts.
    // The check sits after the token await, with nothing awaited before publish.
    const commentId = await this.withTransientRetry("publish", log, () =>
      this.withToken(pr, (token) => {
        this.assertCurrent(key, runId);
        return this.pipeline.publish(token, pr, result.bodyText);
      })
    );

    log.info(
      { commentId, generatedAt: result.generatedAt.toISOString() },
      "Review published"
    );
    return "published";
  }

  private assertCurrent(key: string, runId: number): void {
    if (!this.states.isCurrent(key, runId)) throw new RunSuperseded();
  }

  private async withToken<T>(
    pr: PullRequestRef,
    fn: (token: InstallationToken) => Promise<T>
  ): Promise<T> {
    const token = await this.pipeline.getToken(pr.installationId);
    try {
      return await fn(token);
    } catch (err) {
      if (err instanceof AuthError) this.pipeline.invalidateToken(pr.installationId);
      throw err;
    }
  }

  private withTransientRetry<T>(
    stage: string,
    log: pino.Logger,
    fn: () => Promise<T>
  ): Promise<T> {
    return withRetry(fn, {
      maxAttempts: this.retry.transientAttempts,
      baseDelayMs: this.retry.baseDelayMs,
      maxDelayMs: this.retry.maxDelayMs,
      retryOn: isRetryable,
      delayHintMs: (err) => (err instanceof RateLimitError ? err.retryAfterMs : undefined),
      onRetry: ({ attempt, delayMs, error }) =>
        log.warn(
          { stage, attempt, delayMs, kind: errorKind(error) },
          "Retrying after host error"
        ),
    });
  }
}

function logFailure(log: pino.Logger, err: unknown): void {
  const kind = errorKind(err);
  if (err instanceof NotFoundError) {
    log.warn({ kind, err }, "PR or repository no longer available, dropping event");
  } else if (err instanceof AuthError) {
    log.error({ kind, err }, "Authentication failed, dropping event");
  } else {
    log.error({ kind, err }, "Review failed, dropping event");
  }
}
