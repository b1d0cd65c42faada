import { EventEmitter } from "node:events";
import { ClipboardError, errorMessage } from "../errors";
import type { StyleId } from "../rewrite/styles";
import {
  AudioChunk,
  durationMs,
  IAudioCapture,
  IInputInjector,
  IOverlayPresenter,
  IRewriter,
  ISttProvider,
  Logger,
  RewriteResult
} from "../types/contracts";
import { excerpt } from "../util/text";
import type { ModeManager } from "./modeManager";

export type SessionOutcome =
  | "success"
  | "fallback-raw"
  | "aborted-empty"
  | "aborted-error"
  | "discarded-short";

interface OpenSession {
  readonly id: number;
  readonly startedAt: number;
}

/**
 * One variant per stage; each carries exactly what that stage has produced,
 * so a rewrite without a transcript cannot be represented.
 */
type ControllerState =
  | { stage: "idle" }
  | { stage: "recording"; session: OpenSession; capture: Promise<void> }
  | { stage: "transcribing"; session: OpenSession; style: StyleId }
  | { stage: "rewriting"; session: OpenSession; transcript: string; style: StyleId }
  | { stage: "injecting"; session: OpenSession; transcript: string; text: string };

export type SessionStage = ControllerState["stage"];

export interface SessionTimings {
  recordMs: number;
  sttMs: number;
  rewriteMs: number;
  totalMs: number;
}

export interface SessionSummary {
  id: number;
  outcome: SessionOutcome;
  style?: StyleId;
  rawTranscript?: string;
  /** Set only when the rewrite succeeded. */
  rewrittenText?: string;
  deliveredText?: string;
  error?: string;
  deliveryError?: string;
  timings: SessionTimings;
}

export interface SessionControllerOptions {
  minRecordingMs: number;
  minTranscriptChars: number;
  autoPaste: boolean;
}

export interface SessionDependencies {
  audio: IAudioCapture;
  stt: ISttProvider;
  rewriter: IRewriter;
  injector: IInputInjector;
  modes: ModeManager;
  overlay?: IOverlayPresenter;
  logger: Logger;
}

export declare interface SessionController {
  on(event: "stateChanged", listener: (stage: SessionStage) => void): this;
  on(event: "sessionFinished", listener: (summary: SessionSummary) => void): this;
}

/**
 * Push-to-talk state machine. press()/release() only update state and
 * schedule work, so the key listener is never held up by transcription or
 * the rewrite request. One session is in flight at a time; edges that do not
 * fit the current stage are dropped.
 */
export class SessionController extends EventEmitter {
  private state: ControllerState = { stage: "idle" };
  private nextId = 0;
  private work: Promise<void> | undefined;
  private autoPasteEnabled: boolean;

  constructor(
    private readonly deps: SessionDependencies,
    private readonly options: SessionControllerOptions
  ) {
    super();
    this.autoPasteEnabled = options.autoPaste;
  }

  stage(): SessionStage {
    return this.state.stage;
  }

  autoPaste(): boolean {
    return this.autoPasteEnabled;
  }

  setAutoPaste(enabled: boolean): void {
    this.autoPasteEnabled = enabled;
    this.deps.overlay?.autoPaste(enabled);
    this.deps.logger.info(`auto-paste ${enabled ? "on" : "off"}`);
  }

  press(): void {
    if (this.state.stage !== "idle") {
      this.deps.logger.debug(`press ignored while ${this.state.stage}`);
      return;
    }

    const session: OpenSession = { id: ++this.nextId, startedAt: Date.now() };
    const capture = this.deps.audio.start();
    this.setState({ stage: "recording", session, capture });
    this.deps.overlay?.show("recording");
    this.deps.logger.info(`recording (session ${session.id})`);

    this.work = capture.then(
      () => undefined,
      (error: unknown) => {
        if (this.state.stage === "recording" && this.state.session === session) {
          this.abort(session, error, "capture");
        }
      }
    );
  }

  release(): void {
    const state = this.state;
    if (state.stage !== "recording") {
      this.deps.logger.debug(`release ignored while ${state.stage}`);
      return;
    }

    // the style is fixed at release; later changes apply to the next utterance
    const style = this.deps.modes.current().id;
    this.setState({ stage: "transcribing", session: state.session, style });
    this.deps.overlay?.show("processing");
    this.work = this.process(state.session, state.capture, style);
  }

  /** Resolves once the work scheduled so far has settled. */
  async settled(): Promise<void> {
    let current = this.work;
    while (current) {
      await current;
      if (current === this.work) {
        return;
      }
      current = this.work;
    }
  }

  /** Stops an open recording without processing it and waits for in-flight work. */
  async shutdown(): Promise<void> {
    const state = this.state;
    if (state.stage === "recording") {
      this.finish(state.session, { outcome: "aborted-empty" });
      try {
        await state.capture;
        await this.deps.audio.stop();
      } catch (error) {
        this.deps.logger.debug(`capture stop during shutdown: ${errorMessage(error)}`);
      }
    }
    await this.settled();
  }

  private async process(session: OpenSession, capture: Promise<void>, style: StyleId): Promise<void> {
    const timings: SessionTimings = { recordMs: 0, sttMs: 0, rewriteMs: 0, totalMs: 0 };

    let audio: AudioChunk;
    try {
      await capture;
      audio = await this.deps.audio.stop();
    } catch (error) {
      this.abort(session, error, "capture");
      return;
    }

    timings.recordMs = durationMs(audio);
    if (timings.recordMs < this.options.minRecordingMs) {
      this.deps.logger.info(`recording too short (${Math.round(timings.recordMs)}ms), discarded`);
      this.deps.overlay?.show("idle");
      this.finish(session, { outcome: "discarded-short", timings });
      return;
    }

    const t1 = Date.now();
    let transcript: string;
    try {
      transcript = (await this.deps.stt.transcribe(audio)).text.trim();
    } catch (error) {
      this.abort(session, error, "transcription", timings);
      return;
    }
    timings.sttMs = Date.now() - t1;

    if (!transcript || transcript.length < this.options.minTranscriptChars) {
      this.deps.logger.warn("no speech detected");
      this.deps.overlay?.show("idle");
      this.finish(session, { outcome: "aborted-empty", rawTranscript: transcript, timings });
      return;
    }
    this.deps.logger.info(`raw: ${excerpt(transcript)}`);

    this.setState({ stage: "rewriting", session, transcript, style });

    const t2 = Date.now();
    const result = await this.rewriteOrFallback(transcript, style);
    timings.rewriteMs = Date.now() - t2;

    const text = result.ok ? result.text : transcript;
    if (result.ok) {
      this.deps.logger.info(`rewritten (${style}, ${result.provider}): ${excerpt(text)}`);
    } else {
      this.deps.logger.info(`using raw transcript (${result.reason})`);
    }

    this.setState({ stage: "injecting", session, transcript, text });

    let deliveryError: string | undefined;
    let clipboardFailed = false;
    try {
      await this.deps.injector.deliver(text, this.autoPasteEnabled);
    } catch (error) {
      deliveryError = errorMessage(error);
      clipboardFailed = error instanceof ClipboardError;
      this.deps.logger.warn(`delivery failed: ${deliveryError}`);
    }

    timings.totalMs = Date.now() - session.startedAt;
    this.deps.overlay?.show(clipboardFailed ? "error" : "done");
    this.deps.logger.info(
      `done (rec ${seconds(timings.recordMs)} + stt ${seconds(timings.sttMs)} + rewrite ${seconds(timings.rewriteMs)}, total ${seconds(timings.totalMs)})`
    );
    this.finish(session, {
      outcome: result.ok ? "success" : "fallback-raw",
      style,
      rawTranscript: transcript,
      rewrittenText: result.ok ? result.text : undefined,
      deliveredText: text,
      deliveryError,
      timings
    });
  }

  private async rewriteOrFallback(transcript: string, style: StyleId): Promise<RewriteResult> {
    try {
      return await this.deps.rewriter.rewrite(transcript, style);
    } catch (error) {
      return { ok: false, reason: errorMessage(error), provider: "unknown" };
    }
  }

  private abort(
    session: OpenSession,
    error: unknown,
    stage: "capture" | "transcription",
    timings?: SessionTimings
  ): void {
    const message = errorMessage(error);
    this.deps.logger.error(`${stage} failed: ${message}`);
    this.deps.overlay?.show("error");
    this.finish(session, { outcome: "aborted-error", error: message, timings });
  }

  private finish(
    session: OpenSession,
    result: Omit<SessionSummary, "id" | "timings"> & { timings?: SessionTimings }
  ): void {
    const timings = result.timings ?? { recordMs: 0, sttMs: 0, rewriteMs: 0, totalMs: 0 };
    if (!timings.totalMs) {
      timings.totalMs = Date.now() - session.startedAt;
    }
    this.setState({ stage: "idle" });
    this.emit("sessionFinished", { ...result, id: session.id, timings });
  }

  private setState(next: ControllerState): void {
    this.state = next;
    this.emit("stateChanged", next.stage);
  }
}

function seconds(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}
