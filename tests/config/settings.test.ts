import { describe, expect, it } from "vitest";
import { readSettings } from "../../src/config/settings";
import { ConfigError } from "../../src/errors";

const base = { WHISPER_MODEL_DIR: "/tmp/models" };

describe("readSettings", () => {
  it("applies defaults", () => {
    expect(readSettings(base)).toMatchObject({
      rewriteProvider: "openai",
      rewriteModel: "gpt-4o-mini",
      rewriteTimeoutMs: 8000,
      defaultStyle: "clean",
      autoPaste: false,
      sttProvider: "whisper-cli",
      sttModel: "base.en",
      sttModelDir: "/tmp/models",
      whisperServerUrl: "http://127.0.0.1:8178",
      whisperServerManaged: true,
      talkKey: "alt_r",
      cycleKey: "f19",
      autoPasteKey: undefined,
      recorder: "auto",
      minRecordingMs: 300,
      minTranscriptChars: 1,
      overlay: "terminal",
      logLevel: "info"
    });
  });

  it("reads overrides and treats blank values as unset", () => {
    const settings = readSettings({
      ...base,
      OPENAI_API_KEY: "  test-secret ",
      MODE: "email",
      AUTO_PASTE: "Yes",
      REWRITE_TIMEOUT_MS: "2500",
      WHISPER_SERVER_URL: "http://localhost:9000/",
      LLM_MODEL: "   ",
      AUTOPASTE_KEY: "f18"
    });

    expect(settings.openAiApiKey).toBe("test-secret");
    expect(settings.defaultStyle).toBe("email");
    expect(settings.autoPaste).toBe(true);
    expect(settings.rewriteTimeoutMs).toBe(2500);
    expect(settings.whisperServerUrl).toBe("http://localhost:9000");
    expect(settings.rewriteModel).toBe("gpt-4o-mini");
    expect(settings.autoPasteKey).toBe("f18");
  });

  it("disables a key bound to none", () => {
    expect(readSettings({ ...base, CYCLE_KEY: "none" }).cycleKey).toBeUndefined();
  });

  it("lists every invalid variable", () => {
    let error: unknown;
    try {
      readSettings({ ...base, MODE: "poem", AUTO_PASTE: "maybe", MIN_RECORDING_MS: "-5" });
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(ConfigError);
    const issues = error instanceof ConfigError ? error.issues : [];
    expect(issues.map((issue) => issue.split(":")[0]).sort()).toEqual(["AUTO_PASTE", "MIN_RECORDING_MS", "MODE"]);
  });
});
