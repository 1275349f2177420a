import type { InstallationToken } from "../review/types.js";
import { AuthError } from "../utils/errors.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "token-cache" });

export type TokenExchanger = (installationId: number) => Promise<InstallationToken>;

export interface TokenCacheOptions {
  /** A cached token is refreshed this long before it expires */
  safetyMarginMs: number;
  now?: () => number;
}

type CacheCell =
  | { kind: "ready"; token: InstallationToken }
  | { kind: "refreshing"; promise: Promise<InstallationToken> };

/**
 * Installation tokens keyed by installation id, with at most one
 * exchange in flight per installation.
 */
export class InstallationTokenCache {
  private readonly cells = new Map<number, CacheCell>();
  private readonly now: () => number;

  constructor(
    private readonly exchange: TokenExchanger,
    private readonly options: TokenCacheOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  // Not async: the cell lookup and the refresh registration must happen
  // in the same tick so concurrent callers see the in-flight promise.
  getToken(installationId: number): Promise<InstallationToken> {
    const cell = this.cells.get(installationId);

    if (cell?.kind === "refreshing") return cell.promise;
    if (cell?.kind === "ready" && this.isUsable(cell.token)) {
      return Promise.resolve(cell.token);
    }

    return this.refresh(installationId);
  }

  invalidate(installationId: number): void {
    const cell = this.cells.get(installationId);
    if (cell?.kind === "ready") {
      this.cells.delete(installationId);
      log.info({ installationId }, "Invalidated cached installation token");
    }
  }

  get size(): number {
    return this.cells.size;
  }

  private isUsable(token: InstallationToken): boolean {
    return this.now() < token.expiresAt.getTime() - this.options.safetyMarginMs;
  }

  private refresh(installationId: number): Promise<InstallationToken> {
    const promise = this.runExchange(installationId);
    this.cells.set(installationId, { kind: "refreshing", promise });
    return promise;
  }

  // Only refresh() replaces a refreshing cell, so the cell is still ours here
  private async runExchange(installationId: number): Promise<InstallationToken> {
    try {
      // Deferred so a synchronous throw still clears the refreshing cell
      const token = await Promise.resolve(installationId).then((id) => this.exchange(id));
      if (token.expiresAt.getTime() <= this.now()) {
        throw new AuthError(
          `Installation ${installationId} returned an already expired token`
        );
      }
      this.cells.set(installationId, { kind: "ready", token });
      log.debug({ installationId, expiresAt: token.expiresAt }, "Cached installation token");
      return token;
    } catch (err) {
      // No cell left behind, so the next caller starts a new exchange
      this.cells.delete(installationId);
      log.warn({ installationId, err }, "Installation token exchange failed");
      throw err;
    }
  }
}
