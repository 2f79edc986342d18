import { Config, repoKey } from "../config.js";
import {
  GitHubRequestOptions,
  addCommitDetails,
  addPullRequestDetails,
  getDefaultBranch,
  listCommitsInWindow,
  listPullRequestsInWindow,
} from "../github/client.js";
import type { ActivityOutcome, ActivityReport, ActivityWindow } from "./model.js";

export function githubOptions(config: Readonly<Config>): GitHubRequestOptions {
  return {
    token: config.githubToken,
    apiUrl: config.githubApiUrl,
    timeoutMs: config.requestTimeoutMs,
  };
}

/**
 * Pull requests and default-branch commits for the configured repository
 * inside `window`. Any API failure propagates; there is no fallback to an
 * empty report.
 */
export async function collectActivity(
  config: Readonly<Config>,
  window: ActivityWindow
): Promise<ActivityReport> {
  const repository = repoKey(config.githubRepo);
  const options = githubOptions(config);

  const defaultBranch =
    config.githubDefaultBranch ?? (await getDefaultBranch(config.githubRepo, options));

  console.log(
    `  Fetching activity for ${repository} (${defaultBranch}) since ${window.start.toISOString()}`
  );

  const pullRequests = await addPullRequestDetails(
    config.githubRepo,
    await listPullRequestsInWindow(config.githubRepo, window, options),
    options
  );
  const commits = await addCommitDetails(
    config.githubRepo,
    await listCommitsInWindow(config.githubRepo, defaultBranch, window, options),
    options
  );

  console.log(`  → ${pullRequests.length} pull requests · ${commits.length} commits`);

  return { repository, window, defaultBranch, pullRequests, commits };
}

export function classifyActivity(report: ActivityReport): ActivityOutcome {
  if (report.pullRequests.length === 0 && report.commits.length === 0) {
    return { kind: "empty", report };
  }
  return { kind: "active", report };
}
