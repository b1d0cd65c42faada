import { describe, expect, it, vi } from "vitest";
import { InvalidStyleError } from "../../src/errors";
import { ModeManager } from "../../src/orchestration/modeManager";
import { STYLE_IDS } from "../../src/rewrite/styles";

describe("ModeManager", () => {
  it("starts on the configured style", () => {
    expect(new ModeManager("email").current().id).toBe("email");
  });

  it("returns to the starting style after a full cycle", () => {
    const modes = new ModeManager("notes");
    const seen: string[] = [];
    for (let i = 0; i < STYLE_IDS.length; i++) {
      seen.push(modes.cycle().id);
    }
    expect(seen).toEqual(["prompt", "clean", "message", "email", "notes"]);
    expect(modes.current().id).toBe("notes");
  });

  it("cycles through a custom order", () => {
    const modes = new ModeManager("message", ["clean", "message"]);
    expect(modes.cycle().id).toBe("clean");
    expect(modes.cycle().id).toBe("message");
  });

  it("rejects unknown styles and keeps the current one", () => {
    const modes = new ModeManager("clean");
    expect(() => modes.set("poem")).toThrow(InvalidStyleError);
    expect(() => modes.set("poem")).toThrow('Unknown style "poem". Available: clean, message, email, notes, prompt');
    expect(modes.current().id).toBe("clean");
  });

  it("rejects a style that is not part of the order", () => {
    expect(() => new ModeManager("email", ["clean", "notes"])).toThrow(InvalidStyleError);
  });

  it("notifies listeners until they unsubscribe", () => {
    const modes = new ModeManager("clean");
    const listener = vi.fn();
    const unsubscribe = modes.onChange(listener);

    modes.cycle();
    modes.set("prompt");
    unsubscribe();
    modes.cycle();

    expect(listener.mock.calls.map(([style]) => style.id)).toEqual(["message", "prompt"]);
  });

  it("lists styles with labels in cycle order", () => {
    expect(new ModeManager().list().map((s) => s.label)).toEqual([
      "Clean",
      "Message",
      "Email",
      "Notes",
      "Prompt"
    ]);
  });
});
