import dotenv from "dotenv";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { ConfigurationError } from "./errors.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

dotenv.config({ path: join(__dirname, "..", ".env") });

export interface RepoConfig {
  owner: string;
  name: string;
}

export interface Config {
  githubToken: string;
  githubRepo: RepoConfig;
  githubApiUrl: string;
  // Skips the repository lookup when set
  githubDefaultBranch?: string;

  anthropicApiKey: string;
  anthropicModel: string;
  summaryMaxTokens: number;

  webhookUrl: string;

  windowHours: number;
  timezone: string;
  requestTimeoutMs: number;
}

export type ConfigMode = "full" | "dry-run" | "collect-only";

export const DEFAULT_WINDOW_HOURS = 24;
export const DEFAULT_MODEL = "claude-sonnet-4-6";

export function repoKey(repo: RepoConfig): string {
  return `${repo.owner}/${repo.name}`;
}

export function parseRepo(repoStr: string): RepoConfig {
  const parts = repoStr.trim().split("/");
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new ConfigurationError(
      `Invalid repo format: ${repoStr}. Expected format: owner/name`
    );
  }
  return { owner: parts[0], name: parts[1] };
}

function parsePositiveInt(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number
): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${key} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function parseTimezone(env: NodeJS.ProcessEnv): string {
  const timezone = env.TIMEZONE?.trim() || "UTC";
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: timezone });
  } catch {
    throw new ConfigurationError(`TIMEZONE "${timezone}" is not a known IANA time zone`);
  }
  return timezone;
}

function required(env: NodeJS.ProcessEnv, key: string, needed: boolean): string {
  const value = env[key]?.trim();
  if (!value) {
    if (!needed) return "";
    throw new ConfigurationError(`${key} is required`);
  }
  return value;
}

/**
 * Builds the run configuration from the environment. The result is frozen
 * and handed to each stage; nothing reads `process.env` after this.
 *
 * `--collect-only` runs need only the GitHub settings and dry runs skip the
 * webhook, so those credentials are optional in the matching modes.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  mode: ConfigMode = "full"
): Readonly<Config> {
  const githubRepo = parseRepo(required(env, "GITHUB_REPOSITORY", true));
  const githubToken = required(env, "GITHUB_TOKEN", true);

  const anthropicApiKey = required(env, "ANTHROPIC_API_KEY", mode !== "collect-only");
  const webhookUrl = required(env, "DIGEST_WEBHOOK_URL", mode === "full");
  if (webhookUrl && !URL.canParse(webhookUrl)) {
    throw new ConfigurationError("DIGEST_WEBHOOK_URL must be a valid URL");
  }

  const githubApiUrl = (env.GITHUB_API_URL?.trim() || "https://api.github.com").replace(
    /\/+$/,
    ""
  );

  return Object.freeze({
    githubToken,
    githubRepo,
    githubApiUrl,
    githubDefaultBranch: env.GITHUB_DEFAULT_BRANCH?.trim() || undefined,
    anthropicApiKey,
    anthropicModel: env.ANTHROPIC_MODEL?.trim() || DEFAULT_MODEL,
    summaryMaxTokens: parsePositiveInt(env, "SUMMARY_MAX_TOKENS", 1024),
    webhookUrl,
    windowHours: parsePositiveInt(env, "DIGEST_WINDOW_HOURS", DEFAULT_WINDOW_HOURS),
    timezone: parseTimezone(env),
    requestTimeoutMs: parsePositiveInt(env, "REQUEST_TIMEOUT_MS", 30_000),
  });
}
