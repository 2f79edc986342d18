export type PullRequestState = "open" | "closed" | "merged";

export interface PullRequestRecord {
  number: number;
  title: string;
  author: string; // login, "ghost" for deleted accounts
  state: PullRequestState;
  createdAt: string; // ISO
  updatedAt: string; // ISO
  mergedAt?: string;
  closedAt?: string;
  baseBranch: string;
  headBranch: string;
  draft: boolean;
  url: string;
  // Change size, absent when the detail lookup failed
  additions?: number;
  deletions?: number;
  changedFiles?: number;
  commitCount?: number;
  mergeableState?: string;
}

export interface CommitRecord {
  sha: string;
  shortSha: string;
  message: string; // First line only
  author: string; // login when linked to an account, git author name otherwise
  authorName?: string;
  timestamp: string; // ISO, author date with committer date fallback
  branch: string;
  url: string;
  additions?: number;
  deletions?: number;
  totalChanges?: number;
  filesChanged?: number;
}
