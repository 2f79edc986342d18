import Anthropic, {
  APIConnectionError,
  APIError,
  AuthenticationError as AnthropicAuthenticationError,
  InternalServerError,
  PermissionDeniedError,
  RateLimitError,
} from "@anthropic-ai/sdk";
import type { Config } from "../config.js";
import {
  AuthenticationError,
  MalformedResponseError,
  NetworkError,
  PipelineError,
  QuotaExceededError,
} from "../errors.js";
import type { SummaryClient, SummaryRequest } from "../summary/summarizer.js";

const options = { dependency: "anthropic" as const };

export function toPipelineError(error: unknown): unknown {
  if (error instanceof PipelineError) return error;

  if (error instanceof APIConnectionError) {
    return new NetworkError(`Anthropic API unreachable: ${error.message}`, "summarize", {
      ...options,
      cause: error,
    });
  }
  if (error instanceof AnthropicAuthenticationError || error instanceof PermissionDeniedError) {
    return new AuthenticationError(`Anthropic rejected the API key: ${error.message}`, "summarize", {
      ...options,
      status: error.status,
      cause: error,
    });
  }
  if (error instanceof RateLimitError) {
    return new QuotaExceededError(`Anthropic rate limit or quota hit: ${error.message}`, "summarize", {
      ...options,
      status: error.status,
      cause: error,
    });
  }
  // 5xx and 529 overloaded
  if (error instanceof InternalServerError) {
    return new NetworkError(`Anthropic service unavailable: ${error.message}`, "summarize", {
      ...options,
      status: error.status,
      cause: error,
    });
  }
  if (error instanceof APIError) {
    return new PipelineError(`Anthropic API error: ${error.message}`, "summarize", "API_ERROR", {
      ...options,
      status: error.status,
      cause: error,
    });
  }
  return error;
}

/** Concatenated text of the reply; throws when there is none or it was cut off. */
export function extractText(message: Anthropic.Message): string {
  if (!Array.isArray(message.content)) {
    throw new MalformedResponseError("Anthropic response has no content array", "summarize", options);
  }
  if (message.stop_reason === "max_tokens") {
    throw new MalformedResponseError(
      "Anthropic response was truncated at max_tokens; raise SUMMARY_MAX_TOKENS",
      "summarize",
      options
    );
  }

  const text = message.content
    .map((block) => (block.type === "text" ? block.text : ""))
    .join("");
  if (text.trim().length === 0) {
    throw new MalformedResponseError("Anthropic response contained no text", "summarize", options);
  }
  return text;
}

/**
 * Summary client over the Messages API. One non-streaming request per call;
 * retries are left at the SDK's defaults.
 */
export function createAnthropicSummaryClient(config: Readonly<Config>): SummaryClient {
  const client = new Anthropic({
    apiKey: config.anthropicApiKey,
    timeout: config.requestTimeoutMs,
  });

  return {
    async complete(request: SummaryRequest): Promise<string> {
      console.log(`  Calling ${config.anthropicModel}...`);
      let message: Anthropic.Message;
      try {
        message = await client.messages.create({
          model: config.anthropicModel,
          max_tokens: config.summaryMaxTokens,
          system: request.system,
          messages: [{ role: "user", content: request.prompt }],
        });
      } catch (error) {
        throw toPipelineError(error);
      }
      return extractText(message);
    },
  };
}
