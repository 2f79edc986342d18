import { Config } from "../config.js";
import type { ActivityOutcome } from "../activity/model.js";
import { classifyActivity, collectActivity } from "../activity/collectActivity.js";
import { computeWindow, formatReportDate } from "../activity/window.js";
import { createAnthropicSummaryClient } from "../llm/anthropicClient.js";
import { buildDigestMessage, DigestMessage } from "../notify/message.js";
import { postToWebhook } from "../notify/webhook.js";
import { SummaryClient, summarizeActivity } from "../summary/summarizer.js";

export interface DigestJobOptions {
  now?: Date;
  // Print the message instead of posting it
  dryRun?: boolean;
  // Print the collected report as JSON and stop
  collectOnly?: boolean;
  summaryClient?: SummaryClient;
}

export interface DigestJobResult {
  outcome: ActivityOutcome;
  message?: DigestMessage;
  delivered: boolean;
}

export async function runDigestJob(
  config: Readonly<Config>,
  options: DigestJobOptions = {}
): Promise<DigestJobResult> {
  const window = computeWindow(options.now ?? new Date(), config.windowHours);

  console.log("1/3  Collecting activity...");
  const report = await collectActivity(config, window);
  const outcome = classifyActivity(report);

  if (options.collectOnly) {
    console.log(JSON.stringify(report, null, 2));
    return { outcome, delivered: false };
  }

  console.log(
    outcome.kind === "empty"
      ? "2/3  No activity in window, skipping the model"
      : "2/3  Summarizing activity..."
  );
  const client = options.summaryClient ?? createAnthropicSummaryClient(config);
  const summary = await summarizeActivity(outcome, client);

  const message = buildDigestMessage(
    report.repository,
    formatReportDate(window.end, config.timezone),
    summary
  );

  if (options.dryRun) {
    console.log("3/3  Dry run, not posting:");
    console.log("─".repeat(72));
    console.log(message.text);
    console.log("─".repeat(72));
    return { outcome, message, delivered: false };
  }

  console.log("3/3  Posting digest...");
  await postToWebhook(config.webhookUrl, message, { timeoutMs: config.requestTimeoutMs });
  console.log(`\n✅ Digest for ${report.repository} delivered.`);

  return { outcome, message, delivered: true };
}
