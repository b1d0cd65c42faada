import { sanitizeForLog } from "./util/text";

export type DictationErrorCode =
  | "DeviceUnavailable"
  | "TranscriptionFailed"
  | "RewriteFailed"
  | "ClipboardError"
  | "PasteError"
  | "InvalidStyle"
  | "ConfigError";

export class DictationError extends Error {
  constructor(readonly code: DictationErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = code;
  }
}

export class DeviceUnavailableError extends DictationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("DeviceUnavailable", message, options);
  }
}

export class TranscriptionFailedError extends DictationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("TranscriptionFailed", message, options);
  }
}

export class RewriteFailedError extends DictationError {
  constructor(message: string, readonly statusCode?: number, options?: { cause?: unknown }) {
    super("RewriteFailed", message, options);
  }

  static fromApiError(provider: string, model: string, error: unknown): RewriteFailedError {
    if (error instanceof RewriteFailedError) return error;

    const statusCode = extractStatusCode(error);
    const excerpt = sanitizeForLog(extractErrorBody(error)).slice(0, 300);
    const status = statusCode === undefined ? "" : ` (${statusCode})`;

    return new RewriteFailedError(
      `${provider} rewrite failed${status} model=${model}: ${excerpt || "no response body"}`,
      statusCode,
      { cause: error }
    );
  }
}

export class ClipboardError extends DictationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ClipboardError", message, options);
  }
}

export class PasteError extends DictationError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PasteError", message, options);
  }
}

export class InvalidStyleError extends DictationError {
  constructor(readonly style: string, allowed: readonly string[]) {
    super("InvalidStyle", `Unknown style "${style}". Available: ${allowed.join(", ")}`);
  }
}

export class ConfigError extends DictationError {
  constructor(readonly issues: string[]) {
    super("ConfigError", `Invalid configuration:\n  ${issues.join("\n  ")}`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function extractStatusCode(error: unknown): number | undefined {
  if (!isRecord(error)) return undefined;
  if (typeof error.status === "number") return error.status;
  if (typeof error.statusCode === "number") return error.statusCode;

  const resp = error.response;
  if (isRecord(resp) && typeof resp.status === "number") return resp.status;

  return undefined;
}

function extractErrorBody(error: unknown): string {
  if (!isRecord(error)) return String(error);

  if (typeof error.message === "string" && error.message.trim()) return error.message;

  for (const key of ["error", "data", "response", "cause"]) {
    const v = error[key];
    if (!v) continue;
    try {
      const s = typeof v === "string" ? v : JSON.stringify(v);
      if (s && s !== "{}") return s;
    } catch {
      // circular payloads fall through to the next key
    }
  }

  return String(error);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object";
}
