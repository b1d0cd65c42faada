import { STYLES, StyleId } from "../rewrite/styles";
import type { IOverlayPresenter, OverlayState } from "../types/contracts";

const BARS = "▁▂▃▄▅▆▇█";
const WAVEFORM_WIDTH = 20;
const TRANSIENT_MS = 1500;
const CLEAR_LINE = "\r\x1b[2K";

/** The part of a tty.WriteStream the overlay writes to. */
export interface StatusStream {
  write(chunk: string): boolean;
  isTTY?: boolean;
}

export interface TerminalOverlayOptions {
  stream: StatusStream;
  style: StyleId;
  autoPaste: boolean;
  transientMs?: number;
}

/**
 * Single status line on a TTY: state, live waveform while recording, active
 * style and auto-paste flag. On a non-TTY stream only state changes are
 * written, one per line, without the waveform.
 */
export class TerminalOverlay implements IOverlayPresenter {
  private state: OverlayState = "idle";
  private style: StyleId;
  private autoPasteEnabled: boolean;
  private levels: number[] = new Array<number>(WAVEFORM_WIDTH).fill(0);
  private revertTimer: NodeJS.Timeout | undefined;
  private readonly tty: boolean;

  constructor(private readonly options: TerminalOverlayOptions) {
    this.style = options.style;
    this.autoPasteEnabled = options.autoPaste;
    this.tty = options.stream.isTTY === true;
  }

  show(state: OverlayState): void {
    this.clearRevert();
    this.state = state;
    if (state === "recording") {
      this.levels.fill(0);
    }
    if (state === "done" || state === "error" || state === "settings-open") {
      this.revertTimer = setTimeout(() => {
        this.revertTimer = undefined;
        this.state = "idle";
        this.render();
      }, this.options.transientMs ?? TRANSIENT_MS);
      this.revertTimer.unref();
    }
    this.render();
  }

  amplitude(level: number): void {
    if (this.state !== "recording") {
      return;
    }
    this.levels.shift();
    this.levels.push(Math.min(1, Math.max(0, level)));
    if (this.tty) {
      this.render();
    }
  }

  mode(style: StyleId): void {
    this.style = style;
    this.render();
  }

  autoPaste(enabled: boolean): void {
    this.autoPasteEnabled = enabled;
    this.render();
  }

  dispose(): void {
    this.clearRevert();
    if (this.tty) {
      this.options.stream.write(CLEAR_LINE);
    }
  }

  /** The status text without terminal control sequences. */
  statusLine(): string {
    const settings = `[${STYLES[this.style].label}${this.autoPasteEnabled ? " · auto-paste" : ""}]`;
    switch (this.state) {
      case "recording":
        return this.tty
          ? `● Recording ${renderWaveform(this.levels)} ${settings}`
          : `● Recording ${settings}`;
      case "processing":
        return `… Processing ${settings}`;
      case "done":
        return `✓ Copied ${settings}`;
      case "error":
        return `✗ Nothing pasted, try again ${settings}`;
      case "settings-open":
        return `⚙ Style: ${STYLES[this.style].label} · auto-paste ${this.autoPasteEnabled ? "on" : "off"}`;
      case "idle":
        return `○ Ready ${settings}`;
    }
  }

  private render(): void {
    const line = this.statusLine();
    this.options.stream.write(this.tty ? `${CLEAR_LINE}${line}` : `${line}\n`);
  }

  private clearRevert(): void {
    if (this.revertTimer) {
      clearTimeout(this.revertTimer);
      this.revertTimer = undefined;
    }
  }
}

/** Square-root scaled so normal speech levels (RMS 0.05-0.3) reach the middle bars. */
export function renderWaveform(levels: readonly number[]): string {
  return levels
    .map((level) => BARS[Math.min(BARS.length - 1, Math.floor(Math.sqrt(level) * BARS.length))])
    .join("");
}
