import { ConfigMode, loadConfig } from "../config.js";
import { ConfigurationError, formatDiagnostic } from "../errors.js";
import { runDigestJob } from "./runDigestJob.js";

export const USAGE = `
📋 Repository Activity Digest

Usage: npm run digest -- [options]

Options:
  --dry-run           Print the digest instead of posting it to the webhook
  --collect-only      Print the collected pull requests and commits as JSON
  --window-hours=N    Look back N hours instead of DIGEST_WINDOW_HOURS (24)
  --help, -h          Show this help message

Environment:
  GITHUB_REPOSITORY   owner/name of the repository to report on
  GITHUB_TOKEN        GitHub API token
  ANTHROPIC_API_KEY   Anthropic API key
  DIGEST_WEBHOOK_URL  Chat webhook that receives the digest
`;

export interface CliFlags {
  help: boolean;
  dryRun: boolean;
  collectOnly: boolean;
  windowHours?: number;
}

export function parseFlags(argv: string[]): CliFlags {
  const flags: CliFlags = { help: false, dryRun: false, collectOnly: false };

  for (const arg of argv) {
    if (arg === "--help" || arg === "-h") {
      flags.help = true;
    } else if (arg === "--dry-run") {
      flags.dryRun = true;
    } else if (arg === "--collect-only") {
      flags.collectOnly = true;
    } else if (arg.startsWith("--window-hours=")) {
      const raw = arg.slice("--window-hours=".length);
      const hours = Number(raw);
      if (!Number.isInteger(hours) || hours <= 0) {
        throw new ConfigurationError(`--window-hours must be a positive integer, got "${raw}"`);
      }
      flags.windowHours = hours;
    } else {
      throw new ConfigurationError(`Unknown option: ${arg}`);
    }
  }

  return flags;
}

function modeFor(flags: CliFlags): ConfigMode {
  if (flags.collectOnly) return "collect-only";
  if (flags.dryRun) return "dry-run";
  return "full";
}

/** Runs one digest and resolves to the process exit code. */
export async function runCli(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env
): Promise<number> {
  try {
    const flags = parseFlags(argv);
    if (flags.help) {
      console.log(USAGE);
      return 0;
    }

    const loaded = loadConfig(env, modeFor(flags));
    const config = flags.windowHours
      ? Object.freeze({ ...loaded, windowHours: flags.windowHours })
      : loaded;

    await runDigestJob(config, { dryRun: flags.dryRun, collectOnly: flags.collectOnly });
    return 0;
  } catch (err) {
    console.error(`\n❌ Digest run failed: ${formatDiagnostic(err)}`);
    return 1;
  }
}
