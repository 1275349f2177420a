export type RunOutcome = "published" | "skipped" | "failed";

export interface PullRequestEntry {
  state: "idle" | "processing";
  headSha: string;
  runId: number;
  lastOutcome?: RunOutcome;
}

export type BeginResult =
  | { kind: "started"; runId: number; supersededSha?: string }
  | { kind: "duplicate"; reason: "in-progress" | "already-reviewed" };

export function pullRequestKey(repoFullName: string, pullNumber: number): string {
  return `${repoFullName}#${pullNumber}`;
}

/**
 * Per-PR review state. Every method is a synchronous compare-and-set on the
 * map, so concurrent deliveries can never interleave inside a transition.
 */
export class PullRequestStateTable {
  private readonly entries = new Map<string, PullRequestEntry>();
  private nextRunId = 1;

  constructor(private readonly maxEntries = 5000) {}

  begin(key: string, headSha: string): BeginResult {
    const entry = this.entries.get(key);

    if (entry?.state === "processing") {
      if (entry.headSha === headSha) {
        return { kind: "duplicate", reason: "in-progress" };
      }
      const supersededSha = entry.headSha;
      const runId = this.start(key, headSha);
      return { kind: "started", runId, supersededSha };
    }

    if (
      entry?.headSha === headSha &&
      (entry.lastOutcome === "published" || entry.lastOutcome === "skipped")
    ) {
      return { kind: "duplicate", reason: "already-reviewed" };
    }

    return { kind: "started", runId: this.start(key, headSha) };
  }

  isCurrent(key: string, runId: number): boolean {
    return this.entries.get(key)?.runId === runId;
  }

  /** Moves the PR back to idle; a no-op for a run that was superseded */
  finish(key: string, runId: number, outcome: RunOutcome): boolean {
    const entry = this.entries.get(key);
    if (!entry || entry.runId !== runId || entry.state !== "processing") {
      return false;
    }
    this.entries.set(key, { ...entry, state: "idle", lastOutcome: outcome });
    return true;
  }

  get(key: string): Readonly<PullRequestEntry> | undefined {
    return this.entries.get(key);
  }

  get size(): number {
    return this.entries.size;
  }

  private start(key: string, headSha: string): number {
    const runId = this.nextRunId++;
    // Re-insert so map order tracks recency for eviction
    this.entries.delete(key);
    this.entries.set(key, { state: "processing", headSha, runId });
    this.evictIdle();
    return runId;
  }

  private evictIdle(): void {
    if (this.entries.size <= this.maxEntries) return;
    for (const [key, entry] of this.entries) {
      if (this.entries.size <= this.maxEntries) break;
      if (entry.state === "idle") this.entries.delete(key);
    }
  }
}
