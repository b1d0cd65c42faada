import type { StyleId } from "../rewrite/styles";

export const SAMPLE_RATE_HZ = 16000;
export const CHANNELS = 1;

/** Mono signed 16-bit little-endian PCM at 16 kHz. */
export interface AudioChunk {
  pcm16: Buffer;
  sampleRateHz: number;
  channels: number;
  startedAtIso: string;
}

export interface RawTranscript {
  text: string;
}

export interface RewriteInput {
  transcript: string;
  style: StyleId;
  styleInstruction: string;
}

export interface RewrittenText {
  text: string;
  provider: string;
}

export type RewriteResult =
  | { ok: true; text: string; provider: string }
  | { ok: false; reason: string; provider: string };

export type OverlayState =
  | "idle"
  | "recording"
  | "processing"
  | "done"
  | "error"
  | "settings-open";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface IAudioCapture {
  start(): Promise<void>;
  stop(): Promise<AudioChunk>;
}

export interface ISttProvider {
  transcribe(audio: AudioChunk): Promise<RawTranscript>;
}

/** Providers throw on failure; {@link IRewriter} turns that into a result. */
export interface IRewriteProvider {
  readonly name: string;
  rewrite(input: RewriteInput, signal: AbortSignal): Promise<RewrittenText>;
}

export interface IRewriter {
  rewrite(text: string, style: StyleId): Promise<RewriteResult>;
}

export interface IInputInjector {
  deliver(text: string, autoPaste: boolean): Promise<void>;
}

export interface IOverlayPresenter {
  show(state: OverlayState): void;
  amplitude(level: number): void;
  mode(style: StyleId): void;
  autoPaste(enabled: boolean): void;
  dispose(): void;
}

export function durationMs(audio: AudioChunk): number {
  const bytesPerSecond = audio.sampleRateHz * audio.channels * 2;
  return bytesPerSecond > 0 ? (audio.pcm16.length / bytesPerSecond) * 1000 : 0;
}
