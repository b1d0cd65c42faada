import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { ConfigError } from "../errors";
import { STYLE_IDS, StyleId } from "../rewrite/styles";

export type RewriteProvider = "openai" | "ollama" | "none";
export type SttProvider = "whisper-cli" | "whisper-server";
export type RecorderSetting = "auto" | "sox" | "arecord" | "ffmpeg";

const booleanFlag = z
  .string()
  .toLowerCase()
  .pipe(z.enum(["true", "false", "1", "0", "yes", "no", "on", "off"]))
  .transform((v) => v === "true" || v === "1" || v === "yes" || v === "on");

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();
const optionalString = z
  .string()
  .optional()
  .transform((v) => v?.trim() || undefined);

const envSchema = z.object({
  OPENAI_API_KEY: optionalString,
  OPENAI_API_KEY_FILE: optionalString,
  REWRITE_PROVIDER: z.enum(["openai", "ollama", "none"]).default("openai"),
  LLM_MODEL: z.string().min(1).default("gpt-4o-mini"),
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  OLLAMA_BASE_URL: z.string().url().default("http://127.0.0.1:11434"),
  OLLAMA_MODEL: z.string().min(1).default("llama3.2:3b"),
  REWRITE_TIMEOUT_MS: positiveInt.default(8000),
  MODE: z.enum(STYLE_IDS).default("clean"),
  AUTO_PASTE: booleanFlag.default("false"),
  STT_PROVIDER: z.enum(["whisper-cli", "whisper-server"]).default("whisper-cli"),
  WHISPER_BIN: optionalString,
  WHISPER_SERVER_BIN: z.string().min(1).default("whisper-server"),
  WHISPER_SERVER_URL: z.string().url().default("http://127.0.0.1:8178"),
  WHISPER_SERVER_MANAGED: booleanFlag.default("true"),
  WHISPER_MODEL_PATH: optionalString,
  WHISPER_MODEL: z.string().min(1).default("base.en"),
  WHISPER_MODEL_DIR: optionalString,
  WHISPER_LANGUAGE: z.string().min(1).default("en"),
  WHISPER_TIMEOUT_MS: positiveInt.default(30000),
  PTT_KEY: z.string().min(1).default("alt_r"),
  CYCLE_KEY: optionalString.default("f19"),
  AUTOPASTE_KEY: optionalString,
  PYTHON_PATH: z.string().min(1).default("python3"),
  AUDIO_RECORDER: z.enum(["auto", "sox", "arecord", "ffmpeg"]).default("auto"),
  MIN_RECORDING_MS: nonNegativeInt.default(300),
  MIN_TRANSCRIPT_CHARS: nonNegativeInt.default(1),
  OVERLAY: z.enum(["terminal", "none"]).default("terminal"),
  LOG_LEVEL: z.enum(["error", "warn", "info", "debug"]).default("info")
});

type ParsedEnv = z.infer<typeof envSchema>;

export interface DictationSettings {
  openAiApiKey?: string;
  openAiApiKeyFile?: string;
  rewriteProvider: RewriteProvider;
  rewriteModel: string;
  openAiBaseUrl: string;
  ollamaBaseUrl: string;
  ollamaModel: string;
  rewriteTimeoutMs: number;
  defaultStyle: StyleId;
  autoPaste: boolean;
  sttProvider: SttProvider;
  whisperCppPath?: string;
  whisperServerPath: string;
  whisperServerUrl: string;
  whisperServerManaged: boolean;
  sttModelPath?: string;
  sttModel: string;
  sttModelDir: string;
  sttLanguage: string;
  sttTimeoutMs: number;
  talkKey: string;
  cycleKey?: string;
  autoPasteKey?: string;
  pythonPath: string;
  recorder: RecorderSetting;
  minRecordingMs: number;
  minTranscriptChars: number;
  overlay: "terminal" | "none";
  logLevel: ParsedEnv["LOG_LEVEL"];
}

export function defaultModelDir(): string {
  const dataHome = process.env.XDG_DATA_HOME || join(homedir(), ".local", "share");
  return join(dataHome, "ptt-dictation", "models");
}

/** Reads settings from environment variables; empty strings count as unset. */
export function readSettings(env: NodeJS.ProcessEnv = process.env): DictationSettings {
  const input: Record<string, string> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== "") {
      input[key] = value.trim();
    }
  }

  const parsed = envSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const cfg = parsed.data;
  return {
    openAiApiKey: cfg.OPENAI_API_KEY,
    openAiApiKeyFile: cfg.OPENAI_API_KEY_FILE,
    rewriteProvider: cfg.REWRITE_PROVIDER,
    rewriteModel: cfg.LLM_MODEL,
    openAiBaseUrl: cfg.OPENAI_BASE_URL,
    ollamaBaseUrl: cfg.OLLAMA_BASE_URL,
    ollamaModel: cfg.OLLAMA_MODEL,
    rewriteTimeoutMs: cfg.REWRITE_TIMEOUT_MS,
    defaultStyle: cfg.MODE,
    autoPaste: cfg.AUTO_PASTE,
    sttProvider: cfg.STT_PROVIDER,
    whisperCppPath: cfg.WHISPER_BIN,
    whisperServerPath: cfg.WHISPER_SERVER_BIN,
    whisperServerUrl: cfg.WHISPER_SERVER_URL.replace(/\/+$/, ""),
    whisperServerManaged: cfg.WHISPER_SERVER_MANAGED,
    sttModelPath: cfg.WHISPER_MODEL_PATH,
    sttModel: cfg.WHISPER_MODEL,
    sttModelDir: cfg.WHISPER_MODEL_DIR ?? defaultModelDir(),
    sttLanguage: cfg.WHISPER_LANGUAGE,
    sttTimeoutMs: cfg.WHISPER_TIMEOUT_MS,
    talkKey: cfg.PTT_KEY,
    cycleKey: disabledIfNone(cfg.CYCLE_KEY),
    autoPasteKey: disabledIfNone(cfg.AUTOPASTE_KEY),
    pythonPath: cfg.PYTHON_PATH,
    recorder: cfg.AUDIO_RECORDER,
    minRecordingMs: cfg.MIN_RECORDING_MS,
    minTranscriptChars: cfg.MIN_TRANSCRIPT_CHARS,
    overlay: cfg.OVERLAY,
    logLevel: cfg.LOG_LEVEL
  };
}

function disabledIfNone(key: string | undefined): string | undefined {
  return key === undefined || key.toLowerCase() === "none" ? undefined : key;
}
