import { vi } from "vitest";
import type {
  AudioChunk,
  IAudioCapture,
  IInputInjector,
  IOverlayPresenter,
  IRewriter,
  ISttProvider,
  Logger,
  OverlayState,
  RewriteResult
} from "../../src/types/contracts";
import type { StyleId } from "../../src/rewrite/styles";

export interface MemoryLogger extends Logger {
  lines: string[];
}

export function memoryLogger(): MemoryLogger {
  const lines: string[] = [];
  return {
    lines,
    debug: (m) => lines.push(`debug ${m}`),
    info: (m) => lines.push(`info ${m}`),
    warn: (m) => lines.push(`warn ${m}`),
    error: (m) => lines.push(`error ${m}`)
  };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** PCM of the given length at 16 kHz mono 16-bit. */
export function chunkOfMs(ms: number): AudioChunk {
  return {
    pcm16: Buffer.alloc(Math.round((ms * 16000 * 2) / 1000)),
    sampleRateHz: 16000,
    channels: 1,
    startedAtIso: "2026-01-01T00:00:00.000Z"
  };
}

export class FakeAudioCapture implements IAudioCapture {
  recordingMs = 1500;
  startError: unknown;
  stopError: unknown;
  startCalls = 0;
  stopCalls = 0;

  async start(): Promise<void> {
    this.startCalls++;
    if (this.startError) {
      throw this.startError;
    }
  }

  async stop(): Promise<AudioChunk> {
    this.stopCalls++;
    if (this.stopError) {
      throw this.stopError;
    }
    return chunkOfMs(this.recordingMs);
  }
}

export function fakeStt(text: string | (() => Promise<string>)) {
  const transcribe = vi.fn(async (_audio: AudioChunk) => ({
    text: typeof text === "string" ? text : await text()
  }));
  const stt: ISttProvider = { transcribe };
  return { stt, transcribe };
}

export function fakeRewriter(result: RewriteResult | ((text: string, style: StyleId) => RewriteResult)) {
  const rewrite = vi.fn(async (text: string, style: StyleId) =>
    typeof result === "function" ? result(text, style) : result
  );
  const rewriter: IRewriter = { rewrite };
  return { rewriter, rewrite };
}

export function fakeInjector(error?: unknown) {
  const deliver = vi.fn(async (_text: string, _autoPaste: boolean) => {
    if (error) {
      throw error;
    }
  });
  const injector: IInputInjector = { deliver };
  return { injector, deliver };
}

export class RecordingOverlay implements IOverlayPresenter {
  states: OverlayState[] = [];
  levels: number[] = [];
  modes: StyleId[] = [];
  autoPasteFlags: boolean[] = [];

  show(state: OverlayState): void {
    this.states.push(state);
  }

  amplitude(level: number): void {
    this.levels.push(level);
  }

  mode(style: StyleId): void {
    this.modes.push(style);
  }

  autoPaste(enabled: boolean): void {
    this.autoPasteFlags.push(enabled);
  }

  dispose(): void {}
}
