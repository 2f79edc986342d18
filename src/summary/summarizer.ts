import type { ActivityOutcome } from "../activity/model.js";
import { SUMMARY_SYSTEM_PROMPT, buildActivityPrompt } from "./prompt.js";

export interface SummaryRequest {
  system: string;
  prompt: string;
}

/** A single request/response call to a language model. */
export interface SummaryClient {
  complete(request: SummaryRequest): Promise<string>;
}

export function noActivityMessage(hours: number): string {
  return `No activity in the last ${hours} hours.`;
}

/**
 * Turns the collected activity into the digest body. Empty windows get the
 * fixed message and never reach the model; otherwise the model's text is
 * returned as is.
 */
export async function summarizeActivity(
  outcome: ActivityOutcome,
  client: SummaryClient
): Promise<string> {
  switch (outcome.kind) {
    case "empty":
      return noActivityMessage(outcome.report.window.hours);
    case "active":
      return client.complete({
        system: SUMMARY_SYSTEM_PROMPT,
        prompt: buildActivityPrompt(outcome.report),
      });
  }
}
