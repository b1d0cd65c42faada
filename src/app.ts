import type { DictationSettings } from "./config/settings";
import { resolveApiKey } from "./config/secrets";
import { AudioCaptureService } from "./audio/audioCaptureService";
import { HotkeyEdge, HotkeyListener } from "./hotkey/hotkeyListener";
import { ClipboardInjector } from "./inject/clipboardInjector";
import { ModeManager } from "./orchestration/modeManager";
import { SessionController } from "./orchestration/sessionController";
import { NullOverlay } from "./overlay/nullOverlay";
import { TerminalOverlay } from "./overlay/terminalOverlay";
import { OllamaRewriteProvider } from "./rewrite/ollamaRewriteProvider";
import { OpenAiRewriteProvider } from "./rewrite/openAiRewriteProvider";
import { TranscriptRewriter } from "./rewrite/rewriter";
import { ModelManager } from "./stt/modelManager";
import { findWhisperCppBinary, whisperInstallHint, WhisperCppSttProvider } from "./stt/whisperCppSttProvider";
import { WhisperServerProcess, WhisperServerSttProvider } from "./stt/whisperServerSttProvider";
import type { IOverlayPresenter, IRewriteProvider, ISttProvider, Logger } from "./types/contracts";
import { TranscriptionFailedError } from "./errors";

export type LoggerFactory = (scope: string) => Logger;

export interface AppComponents {
  controller: SessionController;
  modes: ModeManager;
  overlay: IOverlayPresenter;
  listener?: HotkeyListener;
  whisperServer?: WhisperServerProcess;
  logger: Logger;
}

/**
 * Wires the dictation pipeline from settings and routes hotkey edges:
 * talk drives the session, cycle switches style, autopaste toggles pasting.
 */
export class DictationApp {
  private stopped = false;

  constructor(private readonly components: AppComponents) {}

  static async create(settings: DictationSettings, createLogger: LoggerFactory): Promise<DictationApp> {
    const logger = createLogger("app");
    const modes = new ModeManager(settings.defaultStyle);

    const overlay: IOverlayPresenter =
      settings.overlay === "terminal"
        ? new TerminalOverlay({ stream: process.stderr, style: modes.current().id, autoPaste: settings.autoPaste })
        : new NullOverlay();

    const audio = new AudioCaptureService({ recorder: settings.recorder, logger: createLogger("audio") });
    audio.setAmplitudeListener((level) => overlay.amplitude(level));

    const { stt, whisperServer } = await resolveSttProvider(settings, createLogger("stt"));
    const rewriter = new TranscriptRewriter({
      provider: await resolveRewriteProvider(settings, logger),
      timeoutMs: settings.rewriteTimeoutMs,
      logger: createLogger("rewrite")
    });

    const controller = new SessionController(
      {
        audio,
        stt,
        rewriter,
        injector: new ClipboardInjector({ logger: createLogger("inject") }),
        modes,
        overlay,
        logger: createLogger("session")
      },
      {
        minRecordingMs: settings.minRecordingMs,
        minTranscriptChars: settings.minTranscriptChars,
        autoPaste: settings.autoPaste
      }
    );

    let app: DictationApp | undefined;
    const listener = new HotkeyListener(
      {
        pythonPath: settings.pythonPath,
        talkKey: settings.talkKey,
        cycleKey: settings.cycleKey,
        autoPasteKey: settings.autoPasteKey
      },
      (edge) => app?.handleEdge(edge),
      createLogger("hotkey")
    );
    app = new DictationApp({ controller, modes, overlay, listener, whisperServer, logger });
    return app;
  }

  get controller(): SessionController {
    return this.components.controller;
  }

  async start(): Promise<void> {
    const { whisperServer, listener, modes, overlay, logger } = this.components;
    await whisperServer?.start();
    listener?.start();
    overlay.show("idle");
    logger.info(`running; style=${modes.current().id}, auto-paste=${this.controller.autoPaste()}`);
  }

  async stop(): Promise<void> {
    if (this.stopped) {
      return;
    }
    this.stopped = true;
    const { listener, whisperServer, overlay, logger } = this.components;
    listener?.dispose();
    await this.controller.shutdown();
    whisperServer?.stop();
    overlay.dispose();
    logger.info("stopped");
  }

  handleEdge(edge: HotkeyEdge): void {
    const { controller, modes, overlay, logger } = this.components;

    switch (edge.key) {
      case "talk":
        if (edge.type === "press") {
          controller.press();
        } else {
          controller.release();
        }
        return;
      case "cycle": {
        if (edge.type !== "press") return;
        const style = modes.cycle();
        overlay.mode(style.id);
        logger.info(`style: ${style.id}`);
        if (controller.stage() === "idle") {
          overlay.show("settings-open");
        }
        return;
      }
      case "autopaste":
        if (edge.type !== "press") return;
        controller.setAutoPaste(!controller.autoPaste());
        if (controller.stage() === "idle") {
          overlay.show("settings-open");
        }
        return;
    }
  }
}

async function resolveSttProvider(
  settings: DictationSettings,
  logger: Logger
): Promise<{ stt: ISttProvider; whisperServer?: WhisperServerProcess }> {
  const modelPath =
    settings.sttModelPath ?? (await new ModelManager(settings.sttModelDir, logger).ensureModel(settings.sttModel));

  if (settings.sttProvider === "whisper-server") {
    const stt = new WhisperServerSttProvider({
      baseUrl: settings.whisperServerUrl,
      timeoutMs: settings.sttTimeoutMs,
      logger
    });
    const whisperServer = settings.whisperServerManaged
      ? new WhisperServerProcess({
          binaryPath: settings.whisperServerPath,
          modelPath,
          baseUrl: settings.whisperServerUrl,
          language: settings.sttLanguage,
          logger
        })
      : undefined;
    return { stt, whisperServer };
  }

  const binaryPath = await findWhisperCppBinary(settings.whisperCppPath);
  if (!binaryPath) {
    throw new TranscriptionFailedError(`whisper-cli not found. Install it: ${whisperInstallHint()}`);
  }

  return {
    stt: new WhisperCppSttProvider({
      binaryPath,
      modelPath,
      language: settings.sttLanguage,
      timeoutMs: settings.sttTimeoutMs,
      logger
    })
  };
}

async function resolveRewriteProvider(
  settings: DictationSettings,
  logger: Logger
): Promise<IRewriteProvider | undefined> {
  switch (settings.rewriteProvider) {
    case "none":
      return undefined;
    case "ollama":
      return new OllamaRewriteProvider({
        baseUrl: settings.ollamaBaseUrl,
        model: settings.ollamaModel,
        timeoutMs: settings.rewriteTimeoutMs
      });
    case "openai": {
      const apiKey = await resolveApiKey(settings, logger);
      if (!apiKey) {
        logger.warn("no OpenAI API key available; rewrite disabled, raw transcripts will be pasted");
        return undefined;
      }
      return new OpenAiRewriteProvider({
        apiKey,
        baseUrl: settings.openAiBaseUrl,
        model: settings.rewriteModel,
        timeoutMs: settings.rewriteTimeoutMs
      });
    }
  }
}
