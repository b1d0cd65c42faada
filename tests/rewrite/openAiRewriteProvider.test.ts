import type { ChatCompletion } from "openai/resources/chat/completions";
import { describe, expect, it, vi } from "vitest";
import { RewriteFailedError } from "../../src/errors";
import { type ChatCompletionFn, OpenAiRewriteProvider } from "../../src/rewrite/openAiRewriteProvider";
import { SYSTEM_PROMPT } from "../../src/rewrite/prompts";
import type { RewriteInput } from "../../src/types/contracts";

const input: RewriteInput = {
  transcript: "so um the meeting moved to 3 pm",
  style: "message",
  styleInstruction: "Casual chat message."
};

function completion(content: string | null): ChatCompletion {
  return {
    id: "chatcmpl-test",
    object: "chat.completion",
    created: 0,
    model: "gpt-4o-mini",
    choices: [
      {
        index: 0,
        finish_reason: "stop",
        logprobs: null,
        message: { role: "assistant", content, refusal: null }
      }
    ]
  };
}

function provider(complete: ChatCompletionFn): OpenAiRewriteProvider {
  return new OpenAiRewriteProvider({
    apiKey: "test-secret",
    baseUrl: "https://api.openai.com/v1",
    model: "gpt-4o-mini",
    timeoutMs: 8000,
    complete
  });
}

describe("OpenAiRewriteProvider", () => {
  it("sends one low-temperature bounded request and cleans the answer", async () => {
    const complete = vi.fn<ChatCompletionFn>(async () => completion('"Meeting moved to 3 pm."'));
    const signal = new AbortController().signal;

    await expect(provider(complete).rewrite(input, signal)).resolves.toEqual({
      text: "Meeting moved to 3 pm.",
      provider: "openai"
    });

    expect(complete).toHaveBeenCalledTimes(1);
    const [body, options] = complete.mock.calls[0];
    expect(body).toEqual({
      model: "gpt-4o-mini",
      messages: [
        { role: "system", content: SYSTEM_PROMPT },
        { role: "user", content: "Style: Casual chat message.\n\nTranscript:\nso um the meeting moved to 3 pm" }
      ],
      temperature: 0.2,
      max_tokens: 50
    });
    expect(options.signal).toBe(signal);
  });

  it("fails when the response has no content", async () => {
    const result = provider(async () => completion(null)).rewrite(input, new AbortController().signal);

    await expect(result).rejects.toBeInstanceOf(RewriteFailedError);
    await expect(result).rejects.toThrow("openai response had no message content");
  });

  it("fails when the response has no choices", async () => {
    const empty = { ...completion("x"), choices: [] };

    await expect(provider(async () => empty).rewrite(input, new AbortController().signal)).rejects.toThrow(
      "openai response had no message content"
    );
  });

  it("summarises API errors with their status", async () => {
    const complete: ChatCompletionFn = async () => {
      throw Object.assign(new Error("Incorrect API key provided"), { status: 401 });
    };

    const error = await provider(complete)
      .rewrite(input, new AbortController().signal)
      .then(
        () => undefined,
        (e: unknown) => e
      );

    expect(error).toBeInstanceOf(RewriteFailedError);
    expect(error).toMatchObject({
      statusCode: 401,
      message: "openai rewrite failed (401) model=gpt-4o-mini: Incorrect API key provided"
    });
  });

  it("surfaces an aborted request as a failure", async () => {
    const controller = new AbortController();
    const complete: ChatCompletionFn = (_body, { signal }) =>
      new Promise((_resolve, reject) => {
        signal.addEventListener("abort", () => reject(new Error("Request was aborted.")), { once: true });
      });

    const pending = provider(complete).rewrite(input, controller.signal);
    controller.abort();

    await expect(pending).rejects.toThrow("openai rewrite failed model=gpt-4o-mini: Request was aborted.");
  });
});
