import { spawn } from "node:child_process";
import type { EventEmitter } from "node:events";
import type { Readable } from "node:stream";
import type { RecorderSetting } from "../config/settings";
import { DeviceUnavailableError } from "../errors";
import { AudioChunk, CHANNELS, IAudioCapture, Logger, SAMPLE_RATE_HZ } from "../types/contracts";
import { binaryExists } from "../util/exec";
import { rmsAmplitude } from "./wav";

export type RecorderBackend = "sox" | "arecord" | "ffmpeg";

export interface RecorderInfo {
  backend: RecorderBackend;
  binaryPath: string;
}

/** The slice of a child process the capture service relies on. */
export interface RecorderProcess extends EventEmitter {
  stdout: Readable;
  stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
}

export type RecorderSpawner = (recorder: RecorderInfo) => RecorderProcess;
export type RecorderDetector = (setting: RecorderSetting) => Promise<RecorderInfo | undefined>;

export interface CaptureOptions {
  recorder: RecorderSetting;
  logger: Logger;
  amplitudeIntervalMs?: number;
  stopGraceMs?: number;
  spawnRecorder?: RecorderSpawner;
  detectRecorder?: RecorderDetector;
}

interface ActiveRecording {
  proc: RecorderProcess;
  backend: RecorderBackend;
  chunks: Buffer[];
  bytes: number;
  startedAtIso: string;
  stopRequested: boolean;
  unexpectedExit?: string;
  stderr: string;
  lastAmplitudeAt: number;
  closed: Promise<void>;
}

const DEFAULT_AMPLITUDE_INTERVAL_MS = 50;
const DEFAULT_STOP_GRACE_MS = 2000;

/**
 * Streams raw PCM from an external recorder (sox, arecord or ffmpeg) into
 * memory between start() and stop(). Nothing runs while stopped.
 */
export class AudioCaptureService implements IAudioCapture {
  private opening?: Promise<ActiveRecording>;
  private detectedRecorder?: RecorderInfo;
  private detectionDone = false;
  private amplitudeListener?: (level: number) => void;
  private readonly spawnRecorder: RecorderSpawner;
  private readonly detect: RecorderDetector;

  constructor(private readonly options: CaptureOptions) {
    this.spawnRecorder = options.spawnRecorder ?? spawnRawRecorder;
    this.detect = options.detectRecorder ?? detectRecorder;
  }

  setAmplitudeListener(listener: ((level: number) => void) | undefined): void {
    this.amplitudeListener = listener;
  }

  async start(): Promise<void> {
    if (!this.opening) {
      this.opening = this.open().catch((error: unknown) => {
        this.opening = undefined;
        throw error;
      });
    }
    await this.opening;
  }

  async stop(): Promise<AudioChunk> {
    const opening = this.opening;
    if (!opening) {
      return emptyChunk(new Date().toISOString());
    }
    this.opening = undefined;

    const rec = await opening;
    rec.stopRequested = true;
    killProc(rec.proc, "SIGTERM");
    await this.waitForClose(rec);

    const pcm16 = joinSamples(rec.chunks, rec.bytes);
    if (rec.unexpectedExit) {
      if (pcm16.length === 0) {
        throw new DeviceUnavailableError(rec.unexpectedExit);
      }
      this.options.logger.warn(`${rec.unexpectedExit}; keeping ${pcm16.length} bytes captured before the exit`);
    }

    this.options.logger.debug(`captured ${pcm16.length} bytes via ${rec.backend}`);
    return {
      pcm16,
      sampleRateHz: SAMPLE_RATE_HZ,
      channels: CHANNELS,
      startedAtIso: rec.startedAtIso
    };
  }

  private async open(): Promise<ActiveRecording> {
    const recorder = await this.resolveRecorder();
    if (!recorder) {
      throw new DeviceUnavailableError(getInstallInstructions(this.options.recorder));
    }

    let proc: RecorderProcess;
    try {
      proc = this.spawnRecorder(recorder);
    } catch (error) {
      throw new DeviceUnavailableError(`Recording failed to start: ${describe(error)}`, { cause: error });
    }

    let markClosed: () => void = () => undefined;
    const rec: ActiveRecording = {
      proc,
      backend: recorder.backend,
      chunks: [],
      bytes: 0,
      startedAtIso: new Date().toISOString(),
      stopRequested: false,
      stderr: "",
      lastAmplitudeAt: 0,
      closed: new Promise<void>((resolve) => {
        markClosed = resolve;
      })
    };

    proc.stdout.on("data", (chunk: Buffer) => this.onData(rec, chunk));
    proc.stderr?.on("data", (chunk: Buffer) => {
      if (rec.stderr.length < 2000) {
        rec.stderr += chunk.toString();
      }
    });

    proc.once("close", (code: number | null, signal: NodeJS.Signals | null) => {
      if (!isExpectedExit(rec.backend, rec.stopRequested, code, signal)) {
        const msg = rec.stderr.slice(0, 300).trim();
        rec.unexpectedExit = `Recording exited with code ${code}${msg ? `: ${msg}` : ""}`;
        this.options.logger.warn(rec.unexpectedExit);
      }
      markClosed();
    });

    await new Promise<void>((resolve, reject) => {
      const onSpawn = (): void => {
        proc.off("error", onError);
        proc.on("error", (err: Error) => this.options.logger.warn(`recorder error: ${err.message}`));
        resolve();
      };
      const onError = (err: Error): void => {
        proc.off("spawn", onSpawn);
        markClosed();
        reject(new DeviceUnavailableError(`Recording failed to start: ${err.message}`, { cause: err }));
      };
      proc.once("spawn", onSpawn);
      proc.once("error", onError);
    });

    this.options.logger.debug(`recording via ${recorder.backend} (${recorder.binaryPath})`);
    return rec;
  }

  private onData(rec: ActiveRecording, chunk: Buffer): void {
    if (rec.stopRequested) {
      return;
    }
    rec.chunks.push(chunk);
    rec.bytes += chunk.length;

    const listener = this.amplitudeListener;
    const interval = this.options.amplitudeIntervalMs ?? DEFAULT_AMPLITUDE_INTERVAL_MS;
    const now = Date.now();
    if (!listener || now - rec.lastAmplitudeAt < interval) {
      return;
    }
    rec.lastAmplitudeAt = now;
    setImmediate(() => {
      try {
        listener(rmsAmplitude(chunk));
      } catch (error) {
        this.options.logger.debug(`amplitude listener failed: ${describe(error)}`);
      }
    });
  }

  private async waitForClose(rec: ActiveRecording): Promise<void> {
    const grace = this.options.stopGraceMs ?? DEFAULT_STOP_GRACE_MS;
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(true), grace);
    });
    const exited = await Promise.race([rec.closed.then(() => false), timedOut]);
    clearTimeout(timer);
    if (exited) {
      this.options.logger.warn(`${rec.backend} ignored SIGTERM, killing`);
      killProc(rec.proc, "SIGKILL");
    }
  }

  private async resolveRecorder(): Promise<RecorderInfo | undefined> {
    if (!this.detectionDone) {
      this.detectedRecorder = await this.detect(this.options.recorder);
      this.detectionDone = this.detectedRecorder !== undefined;
    }
    return this.detectedRecorder;
  }
}

function emptyChunk(startedAtIso: string): AudioChunk {
  return { pcm16: Buffer.alloc(0), sampleRateHz: SAMPLE_RATE_HZ, channels: CHANNELS, startedAtIso };
}

function joinSamples(chunks: Buffer[], bytes: number): Buffer {
  const joined = Buffer.concat(chunks, bytes);
  return joined.length % 2 === 0 ? joined : joined.subarray(0, joined.length - 1);
}

function killProc(proc: RecorderProcess, signal: NodeJS.Signals): void {
  try {
    proc.kill(signal);
  } catch {
    // already gone
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isExpectedExit(
  backend: RecorderBackend,
  stopRequested: boolean,
  code: number | null,
  signal: NodeJS.Signals | null
): boolean {
  if (code === 0 || (code === null && stopRequested)) {
    return true;
  }
  if (!stopRequested) {
    return false;
  }

  switch (backend) {
    case "arecord":
      return signal === "SIGINT" || signal === "SIGTERM" || code === 1;
    case "ffmpeg":
      return signal === "SIGINT" || signal === "SIGTERM" || code === 255;
    case "sox":
      return signal === "SIGINT" || signal === "SIGTERM";
  }
}

export function buildRecorderArgs(backend: RecorderBackend): string[] {
  const rate = String(SAMPLE_RATE_HZ);
  const channels = String(CHANNELS);
  switch (backend) {
    case "sox":
      return ["-q", "-d", "-t", "raw", "-r", rate, "-c", channels, "-b", "16", "-e", "signed-integer", "-"];
    case "arecord":
      return ["-q", "-f", "S16_LE", "-r", rate, "-c", channels, "-t", "raw"];
    case "ffmpeg":
      return [
        "-hide_banner", "-loglevel", "error",
        "-f", getFFmpegInputFormat(), "-i", getFFmpegInputDevice(),
        "-ar", rate, "-ac", channels, "-f", "s16le", "-"
      ];
  }
}

const spawnRawRecorder: RecorderSpawner = (recorder) =>
  spawn(recorder.binaryPath, buildRecorderArgs(recorder.backend), {
    stdio: ["ignore", "pipe", "pipe"]
  });

function getFFmpegInputFormat(): string {
  switch (process.platform) {
    case "win32": return "dshow";
    case "darwin": return "avfoundation";
    default: return "pulse";
  }
}

function getFFmpegInputDevice(): string {
  switch (process.platform) {
    case "win32": return "audio=default";
    case "darwin": return ":default";
    default: return "default";
  }
}

export async function detectRecorder(setting: RecorderSetting): Promise<RecorderInfo | undefined> {
  const candidates = setting === "auto"
    ? getCandidates()
    : [{ backend: setting, binary: setting }];

  for (const c of candidates) {
    if (await binaryExists(c.binary)) {
      return { backend: c.backend, binaryPath: c.binary };
    }
  }
  return undefined;
}

function getCandidates(): Array<{ backend: RecorderBackend; binary: string }> {
  switch (process.platform) {
    case "linux":
      return [
        { backend: "arecord", binary: "arecord" },
        { backend: "sox", binary: "sox" },
        { backend: "ffmpeg", binary: "ffmpeg" },
      ];
    case "win32":
      return [
        { backend: "ffmpeg", binary: "ffmpeg" },
        { backend: "sox", binary: "sox" },
      ];
    default:
      return [
        { backend: "sox", binary: "sox" },
        { backend: "ffmpeg", binary: "ffmpeg" },
      ];
  }
}

function getInstallInstructions(setting: RecorderSetting): string {
  if (setting !== "auto") {
    return `Configured recorder "${setting}" not found on PATH.`;
  }
  switch (process.platform) {
    case "darwin":
      return "No audio recorder found. Install SoX: brew install sox";
    case "linux":
      return "No audio recorder found. Install arecord (alsa-utils) or SoX: sudo apt install alsa-utils";
    case "win32":
      return "No audio recorder found. Install FFmpeg: winget install ffmpeg";
    default:
      return "No audio recorder found. Install SoX or FFmpeg.";
  }
}
