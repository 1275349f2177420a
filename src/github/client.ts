import { Octokit } from "@octokit/rest";
import { loadEnv } from "../config/env.js";

const USER_AGENT = "pr-review-bot/0.1.0";

/**
 * Octokit authenticated with either an installation token or an app JWT.
 * Every request gets its own timeout signal.
 */
export function getOctokit(
  auth: string,
  timeoutMs: number = loadEnv().GITHUB_REQUEST_TIMEOUT_MS
): Octokit {
  const octokit = new Octokit({ auth, userAgent: USER_AGENT });

  octokit.hook.before("request", (options) => {
    options.request = {
      ...options.request,
      signal: AbortSignal.timeout(timeoutMs),
    };
  });

  return octokit;
}
