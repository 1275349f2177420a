import type { Octokit } from "@octokit/rest";
import type { DiffBundle, DiffFile, InstallationToken, PullRequestRef } from "../review/types.js";
import { createChildLogger } from "../utils/logger.js";
import { getOctokit } from "./client.js";
import { toHostError } from "./errors.js";

const log = createChildLogger({ module: "github-pulls" });

const PER_PAGE = 100;

/** Changed files of a PR, every page, in the order GitHub lists them */
export async function fetchDiff(
  token: InstallationToken,
  pr: PullRequestRef
): Promise<DiffBundle> {
  const octokit = getOctokit(token.token);
  const files: DiffFile[] = [];
  let page = 1;

  while (true) {
    const data = await listFilesPage(octokit, pr, page);

    files.push(
      ...data.map((f) => ({
        path: f.filename,
        status: f.status,
        patchText: f.patch ?? "",
        patchMissing: f.patch === undefined,
        additions: f.additions,
        deletions: f.deletions,
      }))
    );

    if (data.length < PER_PAGE) break;
    page++;
  }

  log.info(
    { repo: pr.repoFullName, pr: pr.pullNumber, sha: pr.headSha, fileCount: files.length, pages: page },
    "Fetched PR files"
  );

  return Object.freeze({
    pullNumber: pr.pullNumber,
    headSha: pr.headSha,
    files: Object.freeze(files),
  });
}

async function listFilesPage(octokit: Octokit, pr: PullRequestRef, page: number) {
  try {
    const { data } = await octokit.pulls.listFiles({
      owner: pr.owner,
      repo: pr.repo,
      pull_number: pr.pullNumber,
      per_page: PER_PAGE,
      page,
    });
    return data;
  } catch (err) {
    throw toHostError(err, `Listing files of ${pr.repoFullName}#${pr.pullNumber}`);
  }
}
