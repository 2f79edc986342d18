import { fetch, type Response } from "undici";
import {
  AuthenticationError,
  NetworkError,
  PipelineError,
  QuotaExceededError,
} from "../errors.js";
import type { DigestMessage } from "./message.js";

export interface WebhookOptions {
  timeoutMs: number;
}

const options = { dependency: "webhook" as const };

// Webhook URLs embed their secret, so only the host goes into diagnostics
function redact(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return "(invalid url)";
  }
}

/**
 * POSTs `{ text }` to the sink. Anything but a 2xx is a run failure; there
 * is no retry.
 */
export async function postToWebhook(
  url: string,
  message: DigestMessage,
  { timeoutMs }: WebhookOptions
): Promise<void> {
  const host = redact(url);

  let response: Response;
  try {
    response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ text: message.text }),
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new NetworkError(`Webhook ${host} unreachable: ${reason}`, "notify", {
      ...options,
      cause: error,
    });
  }

  if (response.ok) {
    await response.body?.cancel();
    return;
  }

  let detail: string;
  try {
    detail = (await response.text()).slice(0, 200);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new NetworkError(
      `Webhook ${host} answered ${response.status} but the reply was cut off: ${reason}`,
      "notify",
      { ...options, status: response.status, cause: error }
    );
  }
  const status = response.status;
  const statusText = response.statusText ? ` ${response.statusText}` : "";
  const summary = `Webhook ${host} answered ${status}${statusText}${detail ? ` (${detail})` : ""}`;

  if (status === 401 || status === 403 || status === 404) {
    throw new AuthenticationError(summary, "notify", { ...options, status });
  }
  if (status === 429) {
    throw new QuotaExceededError(summary, "notify", { ...options, status });
  }
  if (status >= 500) {
    throw new NetworkError(summary, "notify", { ...options, status });
  }
  throw new PipelineError(summary, "notify", "DELIVERY_FAILED", { ...options, status });
}
