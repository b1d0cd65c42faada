import { request } from "undici";
import { RewriteFailedError } from "../errors";
import type { IRewriteProvider, RewriteInput, RewrittenText } from "../types/contracts";
import { buildMessages, cleanModelOutput, maxOutputTokens, REWRITE_TEMPERATURE } from "./prompts";

interface OllamaRewriteProviderOptions {
  baseUrl: string;
  model: string;
  timeoutMs: number;
}

export class OllamaRewriteProvider implements IRewriteProvider {
  readonly name = "ollama";

  constructor(private readonly options: OllamaRewriteProviderOptions) {}

  async rewrite(input: RewriteInput, signal: AbortSignal): Promise<RewrittenText> {
    let payload: unknown;
    try {
      const res = await request(`${this.options.baseUrl.replace(/\/+$/, "")}/api/chat`, {
        method: "POST",
        headers: {
          "content-type": "application/json"
        },
        body: JSON.stringify({
          model: this.options.model,
          messages: buildMessages(input),
          stream: false,
          options: {
            num_predict: maxOutputTokens(input.transcript),
            temperature: REWRITE_TEMPERATURE
          }
        }),
        signal,
        headersTimeout: this.options.timeoutMs,
        bodyTimeout: this.options.timeoutMs
      });

      if (res.statusCode < 200 || res.statusCode >= 300) {
        const body = (await res.body.text()).slice(0, 300);
        throw new RewriteFailedError(`Ollama rewrite failed (${res.statusCode}): ${body}`, res.statusCode);
      }
      payload = await res.body.json();
    } catch (error) {
      throw RewriteFailedError.fromApiError(this.name, this.options.model, error);
    }

    const content = readMessageContent(payload);
    if (content === undefined) {
      throw new RewriteFailedError("Ollama response had no message content");
    }
    return { text: cleanModelOutput(content), provider: this.name };
  }
}

function readMessageContent(payload: unknown): string | undefined {
  if (!payload || typeof payload !== "object" || !("message" in payload)) return undefined;
  const message = payload.message;
  if (!message || typeof message !== "object" || !("content" in message)) return undefined;
  return typeof message.content === "string" ? message.content : undefined;
}
