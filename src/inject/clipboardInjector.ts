import { ClipboardError, PasteError } from "../errors";
import type { IInputInjector, Logger } from "../types/contracts";
import { CommandRunner, runCommand } from "../util/exec";

interface Command {
  file: string;
  args: string[];
}

interface ClipboardInjectorOptions {
  logger: Logger;
  runner?: CommandRunner;
  platform?: NodeJS.Platform;
  env?: NodeJS.ProcessEnv;
  pasteDelayMs?: number;
}

// Linux input-event keycodes for ydotool
const KEY_LEFTCTRL = 29;
const KEY_V = 47;
const PASTE_TIMEOUT_MS = 5000;

/**
 * Copies text to the system clipboard and, when asked, sends the platform
 * paste shortcut to the focused window. Paste is only attempted after a
 * successful copy.
 */
export class ClipboardInjector implements IInputInjector {
  private readonly runner: CommandRunner;
  private readonly platform: NodeJS.Platform;
  private readonly env: NodeJS.ProcessEnv;

  constructor(private readonly options: ClipboardInjectorOptions) {
    this.runner = options.runner ?? runCommand;
    this.platform = options.platform ?? process.platform;
    this.env = options.env ?? process.env;
  }

  async deliver(text: string, autoPaste: boolean): Promise<void> {
    const copy = clipboardCommand(this.platform, this.env);
    try {
      await this.runner(copy.file, copy.args, { input: text, timeoutMs: PASTE_TIMEOUT_MS });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ClipboardError(`Clipboard write via ${copy.file} failed: ${message}`, { cause: error });
    }
    this.options.logger.info(`copied to clipboard: ${text.length} chars`);

    if (!autoPaste) {
      return;
    }

    await delay(this.options.pasteDelayMs ?? 100);

    const paste = pasteCommand(this.platform, this.env);
    try {
      await this.runner(paste.file, paste.args, { timeoutMs: PASTE_TIMEOUT_MS });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new PasteError(
        `Paste via ${paste.file} failed (check accessibility/input permissions): ${message}`,
        { cause: error }
      );
    }
    this.options.logger.info("paste triggered");
  }
}

export function clipboardCommand(platform: NodeJS.Platform, env: NodeJS.ProcessEnv): Command {
  switch (platform) {
    case "darwin":
      return { file: "pbcopy", args: [] };
    case "win32":
      return { file: "clip", args: [] };
    default:
      return env.WAYLAND_DISPLAY
        ? { file: "wl-copy", args: [] }
        : { file: "xclip", args: ["-selection", "clipboard"] };
  }
}

export function pasteCommand(platform: NodeJS.Platform, env: NodeJS.ProcessEnv): Command {
  switch (platform) {
    case "darwin":
      return {
        file: "osascript",
        args: ["-e", 'tell application "System Events" to keystroke "v" using command down']
      };
    case "win32":
      return {
        file: "powershell",
        args: [
          "-NoProfile",
          "-Command",
          "Add-Type -AssemblyName System.Windows.Forms; [System.Windows.Forms.SendKeys]::SendWait('^v')"
        ]
      };
    default:
      return env.WAYLAND_DISPLAY
        ? {
            file: "ydotool",
            args: ["key", `${KEY_LEFTCTRL}:1`, `${KEY_V}:1`, `${KEY_V}:0`, `${KEY_LEFTCTRL}:0`]
          }
        : { file: "xdotool", args: ["key", "--clearmodifiers", "ctrl+v"] };
  }
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
