export type PullRequestEventType = "opened" | "synchronize" | "other";

/** A verified, parsed webhook delivery */
export interface WebhookEvent {
  readonly deliveryId: string;
  readonly eventType: PullRequestEventType;
  readonly action: string;
  readonly installationId: number;
  readonly repoFullName: string;
  readonly owner: string;
  readonly repo: string;
  readonly pullNumber: number;
  readonly headSha: string;
  readonly rawBody: Uint8Array;
  readonly signatureHeader: string;
}

/** Everything a pipeline stage needs to address one PR revision */
export interface PullRequestRef {
  installationId: number;
  repoFullName: string;
  owner: string;
  repo: string;
  pullNumber: number;
  headSha: string;
}

export interface InstallationToken {
  installationId: number;
  token: string;
  expiresAt: Date;
}

export interface DiffFile {
  path: string;
  status: string;
  /** Unified-diff hunks; empty when the host sent none */
  patchText: string;
  /** Binary or oversized file the host returned without a patch */
  patchMissing: boolean;
  additions: number;
  deletions: number;
}

export interface DiffBundle {
  readonly pullNumber: number;
  readonly headSha: string;
  readonly files: readonly DiffFile[];
}

/** Generated review, ready for posting */
export interface ReviewResult {
  pullNumber: number;
  headSha: string;
  bodyText: string;
  generatedAt: Date;
}

export function toPullRequestRef(event: WebhookEvent): PullRequestRef {
  return {
    installationId: event.installationId,
    repoFullName: event.repoFullName,
    owner: event.owner,
    repo: event.repo,
    pullNumber: event.pullNumber,
    headSha: event.headSha,
  };
}
