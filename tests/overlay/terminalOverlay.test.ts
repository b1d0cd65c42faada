import { afterEach, describe, expect, it, vi } from "vitest";
import { renderWaveform, StatusStream, TerminalOverlay } from "../../src/overlay/terminalOverlay";

function stream(isTTY: boolean): StatusStream & { out: string[] } {
  const out: string[] = [];
  return {
    out,
    isTTY,
    write: (chunk: string) => {
      out.push(chunk);
      return true;
    }
  };
}

describe("TerminalOverlay", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("writes one line per change on a plain stream", () => {
    const s = stream(false);
    const overlay = new TerminalOverlay({ stream: s, style: "clean", autoPaste: false });

    overlay.show("recording");
    overlay.amplitude(0.4);
    overlay.show("processing");
    overlay.mode("email");
    overlay.autoPaste(true);

    expect(s.out).toEqual([
      "● Recording [Clean]\n",
      "… Processing [Clean]\n",
      "… Processing [Email]\n",
      "… Processing [Email · auto-paste]\n"
    ]);
  });

  it("redraws a waveform in place on a TTY", () => {
    const s = stream(true);
    const overlay = new TerminalOverlay({ stream: s, style: "notes", autoPaste: false });

    overlay.show("recording");
    overlay.amplitude(1);

    expect(s.out).toEqual([
      `\r\x1b[2K● Recording ${"▁".repeat(20)} [Notes]`,
      `\r\x1b[2K● Recording ${"▁".repeat(19)}█ [Notes]`
    ]);
  });

  it("ignores amplitude outside recording", () => {
    const s = stream(true);
    const overlay = new TerminalOverlay({ stream: s, style: "clean", autoPaste: false });

    overlay.amplitude(0.9);

    expect(s.out).toEqual([]);
  });

  it("returns to ready after a transient state", () => {
    vi.useFakeTimers();
    const s = stream(false);
    const overlay = new TerminalOverlay({ stream: s, style: "clean", autoPaste: true, transientMs: 1000 });

    overlay.show("done");
    vi.advanceTimersByTime(999);
    expect(s.out).toEqual(["✓ Copied [Clean · auto-paste]\n"]);

    vi.advanceTimersByTime(1);
    expect(s.out.at(-1)).toBe("○ Ready [Clean · auto-paste]\n");
  });

  it("cancels the pending revert when a new state arrives", () => {
    vi.useFakeTimers();
    const s = stream(false);
    const overlay = new TerminalOverlay({ stream: s, style: "clean", autoPaste: false, transientMs: 1000 });

    overlay.show("error");
    overlay.show("recording");
    vi.advanceTimersByTime(2000);

    expect(s.out).toEqual(["✗ Nothing pasted, try again [Clean]\n", "● Recording [Clean]\n"]);
  });

  it("shows the settings summary", () => {
    const overlay = new TerminalOverlay({ stream: stream(false), style: "prompt", autoPaste: false });

    overlay.show("settings-open");

    expect(overlay.statusLine()).toBe("⚙ Style: Prompt · auto-paste off");
    overlay.dispose();
  });

  it("clears the line on dispose", () => {
    const s = stream(true);
    new TerminalOverlay({ stream: s, style: "clean", autoPaste: false }).dispose();

    expect(s.out).toEqual(["\r\x1b[2K"]);
  });
});

describe("renderWaveform", () => {
  it("maps levels to bar heights", () => {
    expect(renderWaveform([0, 0.25, 1])).toBe("▁▅█");
  });
});
