import { fetch, type Response } from "undici";
import { z } from "zod";
import { RepoConfig, repoKey } from "../config.js";
import {
  AuthenticationError,
  MalformedResponseError,
  NetworkError,
  PipelineError,
  QuotaExceededError,
} from "../errors.js";
import type { ActivityWindow } from "../activity/model.js";
import { isWithinWindow } from "../activity/window.js";
import { CommitRecord, PullRequestRecord } from "./types.js";

export interface GitHubRequestOptions {
  token: string;
  apiUrl: string;
  timeoutMs: number;
}

const PER_PAGE = 100;

const repoSchema = z.object({
  default_branch: z.string(),
});

const pullSchema = z.object({
  number: z.number(),
  title: z.string(),
  state: z.enum(["open", "closed"]),
  draft: z.boolean().optional(),
  user: z.object({ login: z.string() }).nullable(),
  created_at: z.string(),
  updated_at: z.string(),
  merged_at: z.string().nullable().optional(),
  closed_at: z.string().nullable().optional(),
  html_url: z.string(),
  base: z.object({ ref: z.string() }),
  head: z.object({ ref: z.string() }),
});

const gitActorSchema = z
  .object({
    name: z.string().optional(),
    date: z.string().optional(),
  })
  .nullable()
  .optional();

const commitSchema = z.object({
  sha: z.string(),
  html_url: z.string(),
  author: z.object({ login: z.string() }).nullable().optional(),
  commit: z.object({
    message: z.string(),
    author: gitActorSchema,
    committer: gitActorSchema,
  }),
});

const pullDetailSchema = z.object({
  additions: z.number(),
  deletions: z.number(),
  changed_files: z.number(),
  commits: z.number(),
  mergeable_state: z.string().nullable().optional(),
});

const commitDetailSchema = z.object({
  stats: z
    .object({ additions: z.number(), deletions: z.number(), total: z.number() })
    .optional(),
  files: z.array(z.unknown()).optional(),
});

const errorBodySchema = z.object({ message: z.string() });

export type GitHubPullResponse = z.infer<typeof pullSchema>;
export type GitHubCommitResponse = z.infer<typeof commitSchema>;

function describeCause(error: unknown): string {
  if (error instanceof Error) {
    if (error.name === "TimeoutError") return "request timed out";
    return error.cause instanceof Error ? `${error.message} (${error.cause.message})` : error.message;
  }
  return String(error);
}

function errorForStatus(
  response: Response,
  body: string,
  path: string
): PipelineError {
  const parsed = errorBodySchema.safeParse(safeJson(body));
  const detail = parsed.success ? parsed.data.message : body.slice(0, 200);
  const status = response.status;
  const statusText = response.statusText ? ` ${response.statusText}` : "";
  const message = `GitHub API error on ${path}: ${status}${statusText}${detail ? ` (${detail})` : ""}`;
  const options = { dependency: "github" as const, status };

  if (status === 429 || (status === 403 && response.headers.get("x-ratelimit-remaining") === "0")) {
    return new QuotaExceededError(message, "collect", options);
  }
  if (status === 401 || status === 403) {
    return new AuthenticationError(message, "collect", options);
  }
  if (status >= 500) {
    return new NetworkError(message, "collect", options);
  }
  return new PipelineError(message, "collect", "API_ERROR", options);
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

async function githubRequest(
  path: string,
  options: GitHubRequestOptions,
  params?: Record<string, string>
): Promise<unknown> {
  const query = params ? `?${new URLSearchParams(params).toString()}` : "";
  const url = `${options.apiUrl}${path}${query}`;

  let response: Response;
  try {
    response = await fetch(url, {
      headers: {
        Accept: "application/vnd.github.v3+json",
        Authorization: `token ${options.token}`,
        "User-Agent": "repo-activity-digest",
      },
      signal: AbortSignal.timeout(options.timeoutMs),
    });
  } catch (error) {
    throw new NetworkError(`GitHub request to ${path} failed: ${describeCause(error)}`, "collect", {
      dependency: "github",
      cause: error,
    });
  }

  let text: string;
  try {
    text = await response.text();
  } catch (error) {
    throw new NetworkError(
      `GitHub response for ${path} was cut off: ${describeCause(error)}`,
      "collect",
      { dependency: "github", status: response.status, cause: error }
    );
  }

  if (!response.ok) {
    throw errorForStatus(response, text, path);
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new MalformedResponseError(`GitHub returned a non-JSON body for ${path}`, "collect", {
      dependency: "github",
      cause: error,
    });
  }
}

function parseResponse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, path: string): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    throw new MalformedResponseError(
      `Unexpected GitHub response shape for ${path} at ${where}: ${issue.message}`,
      "collect",
      { dependency: "github", cause: result.error }
    );
  }
  return result.data;
}

/**
 * Walks `page=1..n` until a short page, or until `keepGoing` says the
 * rest cannot matter.
 */
async function githubRequestPaginated<T>(
  path: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: GitHubRequestOptions,
  params: Record<string, string> = {},
  keepGoing: (page: T[]) => boolean = () => true
): Promise<T[]> {
  const allResults: T[] = [];
  let page = 1;

  while (true) {
    const data = await githubRequest(path, options, {
      ...params,
      per_page: String(PER_PAGE),
      page: String(page),
    });
    const results = parseResponse(z.array(schema), data, path);

    allResults.push(...results);

    if (results.length < PER_PAGE || !keepGoing(results)) {
      break;
    }
    page++;
  }

  return allResults;
}

function repoPath(repo: RepoConfig): string {
  return `/repos/${encodeURIComponent(repo.owner)}/${encodeURIComponent(repo.name)}`;
}

export async function getDefaultBranch(
  repo: RepoConfig,
  options: GitHubRequestOptions
): Promise<string> {
  const path = repoPath(repo);
  const data = await githubRequest(path, options);
  return parseResponse(repoSchema, data, path).default_branch;
}

export function toPullRequestRecord(pr: GitHubPullResponse): PullRequestRecord {
  return {
    number: pr.number,
    title: pr.title,
    author: pr.user?.login ?? "ghost",
    state: pr.merged_at ? "merged" : pr.state,
    createdAt: pr.created_at,
    updatedAt: pr.updated_at,
    mergedAt: pr.merged_at ?? undefined,
    closedAt: pr.closed_at ?? undefined,
    baseBranch: pr.base.ref,
    headBranch: pr.head.ref,
    draft: pr.draft ?? false,
    url: pr.html_url,
  };
}

/**
 * Pull requests in every state whose creation or last update falls in the
 * window, newest update first.
 */
export async function listPullRequestsInWindow(
  repo: RepoConfig,
  window: ActivityWindow,
  options: GitHubRequestOptions
): Promise<PullRequestRecord[]> {
  const startMs = window.start.getTime();

  // Sorted by updated_at desc and created_at <= updated_at, so once a page
  // reaches a PR last updated before the window nothing later can match.
  const prs = await githubRequestPaginated(
    `${repoPath(repo)}/pulls`,
    pullSchema,
    options,
    { state: "all", sort: "updated", direction: "desc" },
    (page) => page.every((pr) => Date.parse(pr.updated_at) >= startMs)
  );

  return prs
    .filter(
      (pr) => isWithinWindow(pr.created_at, window) || isWithinWindow(pr.updated_at, window)
    )
    .map(toPullRequestRecord);
}

export function toCommitRecord(
  commit: GitHubCommitResponse,
  branch: string
): CommitRecord | null {
  const timestamp = commit.commit.author?.date ?? commit.commit.committer?.date;
  if (!timestamp) return null;

  const authorName = commit.commit.author?.name;
  return {
    sha: commit.sha,
    shortSha: commit.sha.slice(0, 7),
    message: commit.commit.message.split("\n")[0].trim(),
    author: commit.author?.login ?? authorName ?? "unknown",
    authorName,
    timestamp,
    branch,
    url: commit.html_url,
  };
}

/** Commits on `branch` whose author date (or committer date) is in the window. */
export async function listCommitsInWindow(
  repo: RepoConfig,
  branch: string,
  window: ActivityWindow,
  options: GitHubRequestOptions
): Promise<CommitRecord[]> {
  const commits = await githubRequestPaginated(`${repoPath(repo)}/commits`, commitSchema, options, {
    sha: branch,
    since: window.start.toISOString(),
    until: window.end.toISOString(),
  });

  const records: CommitRecord[] = [];
  for (const commit of commits) {
    const record = toCommitRecord(commit, branch);
    if (!record) {
      console.warn(`  ⚠ Commit ${commit.sha.slice(0, 7)} in ${repoKey(repo)} has no date, skipped`);
      continue;
    }
    if (isWithinWindow(record.timestamp, window)) {
      records.push(record);
    }
  }
  return records;
}

/**
 * Fills in the change size of each pull request from `/pulls/{number}`.
 * A failed lookup leaves that record without size fields.
 */
export async function addPullRequestDetails(
  repo: RepoConfig,
  prs: PullRequestRecord[],
  options: GitHubRequestOptions
): Promise<PullRequestRecord[]> {
  const detailed: PullRequestRecord[] = [];
  for (const pr of prs) {
    const path = `${repoPath(repo)}/pulls/${pr.number}`;
    try {
      const details = parseResponse(pullDetailSchema, await githubRequest(path, options), path);
      detailed.push({
        ...pr,
        additions: details.additions,
        deletions: details.deletions,
        changedFiles: details.changed_files,
        commitCount: details.commits,
        mergeableState: details.mergeable_state ?? undefined,
      });
    } catch (error) {
      if (!(error instanceof PipelineError)) throw error;
      console.warn(
        `  ⚠ Could not fetch details for PR #${pr.number} in ${repoKey(repo)}: ${error.message}`
      );
      detailed.push(pr);
    }
  }
  return detailed;
}

/** Same as `addPullRequestDetails`, from `/commits/{sha}` stats and files. */
export async function addCommitDetails(
  repo: RepoConfig,
  commits: CommitRecord[],
  options: GitHubRequestOptions
): Promise<CommitRecord[]> {
  const detailed: CommitRecord[] = [];
  for (const commit of commits) {
    const path = `${repoPath(repo)}/commits/${commit.sha}`;
    try {
      const details = parseResponse(commitDetailSchema, await githubRequest(path, options), path);
      detailed.push({
        ...commit,
        additions: details.stats?.additions,
        deletions: details.stats?.deletions,
        totalChanges: details.stats?.total,
        filesChanged: details.files?.length,
      });
    } catch (error) {
      if (!(error instanceof PipelineError)) throw error;
      console.warn(
        `  ⚠ Could not fetch details for commit ${commit.shortSha} in ${repoKey(repo)}: ${error.message}`
      );
      detailed.push(commit);
    }
  }
  return detailed;
}
