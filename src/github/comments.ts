import type { InstallationToken, PullRequestRef } from "../review/types.js";
import { createChildLogger } from "../utils/logger.js";
import { getOctokit } from "./client.js";
import { toHostError } from "./errors.js";

const log = createChildLogger({ module: "github-comments" });

/**
 * Posts `body` as a new conversation comment on the PR.
 * Each successful call creates exactly one comment; callers own deduplication.
 */
export async function publishComment(
  token: InstallationToken,
  pr: PullRequestRef,
  body: string
): Promise<number> {
  const octokit = getOctokit(token.token);

  try {
    const { data } = await octokit.issues.createComment({
      owner: pr.owner,
      repo: pr.repo,
      issue_number: pr.pullNumber,
      body,
    });

    log.info(
      { repo: pr.repoFullName, pr: pr.pullNumber, sha: pr.headSha, commentId: data.id },
      "Posted review comment"
    );
    return data.id;
  } catch (err) {
    throw toHostError(err, `Commenting on ${pr.repoFullName}#${pr.pullNumber}`);
  }
}
