import { Response } from "undici";
import type { Config } from "../src/config.js";

export const NOW = new Date("2026-10-19T09:00:00Z");
export const WINDOW_START = "2026-10-18T09:00:00Z";

export function testConfig(overrides: Partial<Config> = {}): Readonly<Config> {
  return Object.freeze({
    githubToken: "test-token",
    githubRepo: { owner: "test", name: "repo" },
    githubApiUrl: "https://api.github.test",
    githubDefaultBranch: undefined,
    anthropicApiKey: "test-key",
    anthropicModel: "claude-sonnet-4-6",
    summaryMaxTokens: 1024,
    webhookUrl: "https://hooks.chat.test/services/test-secret",
    windowHours: 24,
    timezone: "UTC",
    requestTimeoutMs: 30_000,
    ...overrides,
  });
}

export function jsonResponse(
  body: unknown,
  status = 200,
  headers: Record<string, string> = {}
): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers },
  });
}

export function githubPull(overrides: Record<string, unknown> = {}) {
  const number = typeof overrides.number === "number" ? overrides.number : 1;
  return {
    number,
    title: `PR ${number}`,
    state: "open",
    draft: false,
    user: { login: "alice" },
    created_at: "2026-10-19T01:00:00Z",
    updated_at: "2026-10-19T02:00:00Z",
    merged_at: null,
    closed_at: null,
    html_url: `https://github.com/test/repo/pull/${number}`,
    base: { ref: "main" },
    head: { ref: `feature-${number}` },
    ...overrides,
  };
}

export function githubPullDetail(overrides: Record<string, unknown> = {}) {
  return {
    additions: 120,
    deletions: 30,
    changed_files: 4,
    commits: 3,
    mergeable_state: "clean",
    ...overrides,
  };
}

export function githubCommitDetail(overrides: Record<string, unknown> = {}) {
  return {
    stats: { additions: 10, deletions: 2, total: 12 },
    files: [{ filename: "src/index.ts" }, { filename: "README.md" }],
    ...overrides,
  };
}

// A reply whose body stream fails after the first bytes
export function truncatedResponse(status: number): Response {
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(new TextEncoder().encode('{"message":'));
      controller.error(new TypeError("terminated"));
    },
  });
  return new Response(body, { status });
}

export function githubCommit(
  sha: string,
  date: string | null,
  overrides: Record<string, unknown> = {}
) {
  return {
    sha,
    html_url: `https://github.com/test/repo/commit/${sha}`,
    author: { login: "bob" },
    commit: {
      message: `Commit ${sha.slice(0, 7)}\n\nLonger description`,
      author: date ? { name: "Bob Builder", date } : null,
      committer: null,
    },
    ...overrides,
  };
}

export function anthropicMessage(text: string, stopReason = "end_turn") {
  return {
    id: "msg_test",
    type: "message",
    role: "assistant",
    model: "claude-sonnet-4-6",
    content: [{ type: "text", text }],
    stop_reason: stopReason,
    stop_sequence: null,
    usage: { input_tokens: 100, output_tokens: 50 },
  };
}
