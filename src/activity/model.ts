import type { CommitRecord, PullRequestRecord } from "../github/types.js";

export interface ActivityWindow {
  readonly start: Date;
  readonly end: Date;
  readonly hours: number;
}

export interface ActivityReport {
  repository: string; // "owner/name"
  window: ActivityWindow;
  defaultBranch: string;
  pullRequests: PullRequestRecord[];
  commits: CommitRecord[];
}

// The one branch point of a run: summarize, or send the fixed message
export type ActivityOutcome =
  | { kind: "empty"; report: ActivityReport }
  | { kind: "active"; report: ActivityReport };
