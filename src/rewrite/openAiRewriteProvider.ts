import OpenAI from "openai";
import type { ChatCompletion, ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions";
import { RewriteFailedError } from "../errors";
import type { IRewriteProvider, RewriteInput, RewrittenText } from "../types/contracts";
import { buildMessages, cleanModelOutput, maxOutputTokens, REWRITE_TEMPERATURE } from "./prompts";

export type ChatCompletionFn = (
  body: ChatCompletionCreateParamsNonStreaming,
  options: { signal: AbortSignal }
) => Promise<ChatCompletion>;

interface OpenAiRewriteProviderOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
  /** Replaces the SDK call; defaults to `chat.completions.create`. */
  complete?: ChatCompletionFn;
}

export class OpenAiRewriteProvider implements IRewriteProvider {
  readonly name = "openai";
  private readonly complete: ChatCompletionFn;

  constructor(private readonly options: OpenAiRewriteProviderOptions) {
    if (options.complete) {
      this.complete = options.complete;
    } else {
      const client = new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseUrl,
        timeout: options.timeoutMs,
        maxRetries: 0
      });
      this.complete = (body, requestOptions) => client.chat.completions.create(body, requestOptions);
    }
  }

  async rewrite(input: RewriteInput, signal: AbortSignal): Promise<RewrittenText> {
    let content: string | null | undefined;
    try {
      const completion = await this.complete(
        {
          model: this.options.model,
          messages: buildMessages(input),
          temperature: REWRITE_TEMPERATURE,
          max_tokens: maxOutputTokens(input.transcript)
        },
        { signal }
      );
      content = completion.choices[0]?.message?.content;
    } catch (error) {
      throw RewriteFailedError.fromApiError(this.name, this.options.model, error);
    }

    if (typeof content !== "string") {
      throw new RewriteFailedError(`${this.name} response had no message content`);
    }
    return { text: cleanModelOutput(content), provider: this.name };
  }
}
