import { errorMessage } from "../errors";
import type { IRewriter, IRewriteProvider, Logger, RewriteResult } from "../types/contracts";
import { excerpt } from "../util/text";
import { missingLiterals } from "./literals";
import { STYLES, StyleId } from "./styles";

interface TranscriptRewriterOptions {
  /** Undefined when no credential or provider is configured. */
  provider: IRewriteProvider | undefined;
  timeoutMs: number;
  logger: Logger;
}

/**
 * Runs one rewrite request and reports the outcome as a value. Timeouts,
 * transport errors and responses that fail the output checks all come back
 * as `{ ok: false }`; the caller keeps the raw transcript in that case.
 */
export class TranscriptRewriter implements IRewriter {
  private warnedNoProvider = false;

  constructor(private readonly options: TranscriptRewriterOptions) {}

  async rewrite(text: string, style: StyleId): Promise<RewriteResult> {
    const provider = this.options.provider;
    if (!provider) {
      if (!this.warnedNoProvider) {
        this.warnedNoProvider = true;
        this.options.logger.warn("no rewrite backend configured; raw transcripts will be used");
      }
      return { ok: false, reason: "rewrite disabled", provider: "none" };
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const pending = provider.rewrite(
        { transcript: text, style, styleInstruction: STYLES[style].instruction },
        controller.signal
      );
      // a provider that ignores the signal still loses the race
      void pending.catch(() => undefined);
      const rewritten = await Promise.race([pending, abandoned(controller.signal)]);
      const reason = rejectOutput(text, rewritten.text);
      if (reason) {
        this.options.logger.warn(`discarding ${provider.name} output: ${reason}`);
        return { ok: false, reason, provider: provider.name };
      }
      return { ok: true, text: rewritten.text, provider: provider.name };
    } catch (error) {
      const reason = controller.signal.aborted
        ? `timed out after ${this.options.timeoutMs}ms`
        : errorMessage(error);
      this.options.logger.warn(`rewrite failed: ${excerpt(reason, 300)}`);
      return { ok: false, reason, provider: provider.name };
    } finally {
      clearTimeout(timer);
    }
  }
}

function rejectOutput(source: string, output: string): string | undefined {
  const trimmed = output.trim();
  if (!trimmed) {
    return "empty response";
  }
  if (trimmed.length > Math.max(source.length * 3, source.length + 200)) {
    return "response much longer than the transcript";
  }
  const missing = missingLiterals(source, trimmed);
  if (missing.length > 0) {
    return `response dropped literal(s): ${missing.join(", ")}`;
  }
  return undefined;
}

function abandoned(signal: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    signal.addEventListener("abort", () => reject(new Error("rewrite abandoned")), { once: true });
  });
}
