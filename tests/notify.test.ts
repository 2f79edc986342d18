import { describe, it, expect, vi, beforeEach } from "vitest";
import { fetch, Response } from "undici";
import { buildDigestMessage } from "../src/notify/message.js";
import { postToWebhook } from "../src/notify/webhook.js";
import { truncatedResponse } from "./fixtures.js";

vi.mock("undici", async (importOriginal) => {
  const actual = await importOriginal<typeof import("undici")>();
  return { ...actual, fetch: vi.fn() };
});

const WEBHOOK_URL = "https://hooks.chat.test/services/test-secret";

describe("buildDigestMessage", () => {
  it("should put a title naming the repository and date above the summary", () => {
    const message = buildDigestMessage("test/repo", "October 19th 2026", "*@alice*\n• Merged #12");

    expect(message).toEqual({
      title: "*Daily activity digest: test/repo (October 19th 2026)*",
      body: "*@alice*\n• Merged #12",
      text: "*Daily activity digest: test/repo (October 19th 2026)*\n\n*@alice*\n• Merged #12",
    });
  });
});

describe("postToWebhook", () => {
  const message = buildDigestMessage("test/repo", "October 19th 2026", "No activity in the last 24 hours.");

  beforeEach(() => {
    vi.mocked(fetch).mockReset();
  });

  it("should POST the text as JSON", async () => {
    vi.mocked(fetch).mockResolvedValueOnce(new Response("ok", { status: 200 }));

    await postToWebhook(WEBHOOK_URL, message, { timeoutMs: 1000 });

    expect(fetch).toHaveBeenCalledTimes(1);
    const [url, init] = vi.mocked(fetch).mock.calls[0];
    expect(url).toBe(WEBHOOK_URL);
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({ "Content-Type": "application/json" });
    expect(JSON.parse(String(init?.body))).toEqual({
      text: "*Daily activity digest: test/repo (October 19th 2026)*\n\nNo activity in the last 24 hours.",
    });
  });

  it("should release the body of a successful reply", async () => {
    const response = new Response("ok", { status: 200 });
    vi.mocked(fetch).mockResolvedValueOnce(response);

    await postToWebhook(WEBHOOK_URL, message, { timeoutMs: 1000 });

    expect(response.bodyUsed).toBe(true);
  });

  it("should accept any 2xx", async () => {
    vi.mocked(fetch).mockResolvedValueOnce(new Response(null, { status: 204 }));

    await expect(postToWebhook(WEBHOOK_URL, message, { timeoutMs: 1000 })).resolves.toBeUndefined();
  });

  it("should treat a rejected webhook URL as an authentication failure without leaking it", async () => {
    vi.mocked(fetch).mockResolvedValueOnce(new Response("no_service", { status: 404 }));

    const error = await postToWebhook(WEBHOOK_URL, message, { timeoutMs: 1000 }).catch((e: unknown) => e);

    expect(error).toMatchObject({
      name: "AuthenticationError",
      stage: "notify",
      dependency: "webhook",
      status: 404,
      message: "Webhook hooks.chat.test answered 404 (no_service)",
    });
  });

  it("should map 429 to QuotaExceededError", async () => {
    vi.mocked(fetch).mockResolvedValueOnce(new Response("rate_limited", { status: 429 }));

    await expect(postToWebhook(WEBHOOK_URL, message, { timeoutMs: 1000 })).rejects.toMatchObject({
      name: "QuotaExceededError",
    });
  });

  it("should map 5xx to NetworkError", async () => {
    vi.mocked(fetch).mockResolvedValueOnce(new Response("", { status: 503 }));

    await expect(postToWebhook(WEBHOOK_URL, message, { timeoutMs: 1000 })).rejects.toMatchObject({
      name: "NetworkError",
      message: "Webhook hooks.chat.test answered 503",
    });
  });

  it("should surface other non-success responses as delivery failures", async () => {
    vi.mocked(fetch).mockResolvedValueOnce(new Response("invalid_payload", { status: 400 }));

    await expect(postToWebhook(WEBHOOK_URL, message, { timeoutMs: 1000 })).rejects.toMatchObject({
      name: "PipelineError",
      code: "DELIVERY_FAILED",
      status: 400,
    });
  });

  it("should map an error reply cut off mid-body to NetworkError", async () => {
    vi.mocked(fetch).mockResolvedValueOnce(truncatedResponse(500));

    await expect(postToWebhook(WEBHOOK_URL, message, { timeoutMs: 1000 })).rejects.toMatchObject({
      name: "NetworkError",
      stage: "notify",
      dependency: "webhook",
      status: 500,
    });
  });

  it("should map transport failures to NetworkError", async () => {
    vi.mocked(fetch).mockRejectedValueOnce(new TypeError("fetch failed"));

    await expect(postToWebhook(WEBHOOK_URL, message, { timeoutMs: 1000 })).rejects.toMatchObject({
      name: "NetworkError",
      message: "Webhook hooks.chat.test unreachable: fetch failed",
    });
  });
});
