import { spawn, ChildProcess } from "node:child_process";
import { FormData, request } from "undici";
import { encodeWav } from "../audio/wav";
import { TranscriptionFailedError } from "../errors";
import { AudioChunk, ISttProvider, Logger, RawTranscript } from "../types/contracts";
import { normalizeTranscript } from "./transcript";

interface WhisperServerSttOptions {
  baseUrl: string;
  timeoutMs: number;
  logger: Logger;
}

/** Posts recordings to a running whisper.cpp `whisper-server` (`/inference`). */
export class WhisperServerSttProvider implements ISttProvider {
  constructor(private readonly options: WhisperServerSttOptions) {}

  async transcribe(audio: AudioChunk): Promise<RawTranscript> {
    if (audio.pcm16.length === 0) {
      return { text: "" };
    }

    const wav = encodeWav(audio.pcm16, audio.sampleRateHz, audio.channels);
    const form = new FormData();
    form.set("file", new Blob([wav], { type: "audio/wav" }), "utterance.wav");
    form.set("response_format", "json");
    form.set("temperature", "0.0");

    let payload: unknown;
    try {
      const res = await request(`${this.options.baseUrl}/inference`, {
        method: "POST",
        body: form,
        headersTimeout: this.options.timeoutMs,
        bodyTimeout: this.options.timeoutMs
      });

      if (res.statusCode < 200 || res.statusCode >= 300) {
        const body = (await res.body.text()).slice(0, 300);
        throw new Error(`HTTP ${res.statusCode}: ${body}`);
      }
      payload = await res.body.json();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TranscriptionFailedError(`whisper-server failed: ${message}`, { cause: error });
    }

    const text = readText(payload);
    if (text === undefined) {
      throw new TranscriptionFailedError("whisper-server returned no text field");
    }

    const normalized = normalizeTranscript(text);
    this.options.logger.info(`transcription complete: ${normalized.length} chars`);
    return { text: normalized };
  }
}

function readText(payload: unknown): string | undefined {
  if (!payload || typeof payload !== "object" || !("text" in payload)) return undefined;
  return typeof payload.text === "string" ? payload.text : undefined;
}

interface WhisperServerProcessOptions {
  binaryPath: string;
  modelPath: string;
  baseUrl: string;
  language: string;
  logger: Logger;
  readyTimeoutMs?: number;
}

/** Owns a background whisper-server process for the lifetime of the app. */
export class WhisperServerProcess {
  private proc: ChildProcess | undefined;

  constructor(private readonly options: WhisperServerProcessOptions) {}

  async start(): Promise<void> {
    if (await isReachable(this.options.baseUrl)) {
      this.options.logger.info(`whisper-server already running at ${this.options.baseUrl}`);
      return;
    }

    const url = new URL(this.options.baseUrl);
    const args = [
      "-m", this.options.modelPath,
      "-l", this.options.language,
      "--host", url.hostname,
      "--port", url.port || "80",
    ];

    this.options.logger.info(`starting ${this.options.binaryPath} ${args.join(" ")}`);
    const proc = spawn(this.options.binaryPath, args, { stdio: "ignore" });
    this.proc = proc;

    let exitReason: string | undefined;
    proc.once("error", (err) => {
      exitReason = `failed to start: ${err.message}`;
    });
    proc.once("exit", (code, signal) => {
      exitReason ??= `exited (code=${code}, signal=${signal ?? "none"})`;
      if (this.proc === proc) {
        this.proc = undefined;
      }
    });

    const deadline = Date.now() + (this.options.readyTimeoutMs ?? 10_000);
    while (Date.now() < deadline) {
      if (exitReason) {
        throw new TranscriptionFailedError(`whisper-server ${exitReason}`);
      }
      if (await isReachable(this.options.baseUrl)) {
        this.options.logger.info("whisper-server is ready");
        return;
      }
      await delay(500);
    }

    this.stop();
    throw new TranscriptionFailedError("timed out waiting for whisper-server");
  }

  stop(): void {
    if (this.proc && !this.proc.killed) {
      this.options.logger.info("stopping whisper-server");
      this.proc.kill("SIGTERM");
    }
    this.proc = undefined;
  }
}

async function isReachable(baseUrl: string): Promise<boolean> {
  try {
    const res = await request(baseUrl, { method: "GET", headersTimeout: 1000, bodyTimeout: 1000 });
    await res.body.dump();
    return true;
  } catch {
    return false;
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
