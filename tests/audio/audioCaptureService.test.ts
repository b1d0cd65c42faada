import { EventEmitter } from "node:events";
import { PassThrough } from "node:stream";
import { describe, expect, it, vi } from "vitest";
import {
  AudioCaptureService,
  buildRecorderArgs,
  isExpectedExit,
  RecorderInfo
} from "../../src/audio/audioCaptureService";
import { DeviceUnavailableError } from "../../src/errors";
import { memoryLogger } from "../helpers/fakes";

class FakeRecorder extends EventEmitter {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly kill = vi.fn((signal?: NodeJS.Signals) => {
    setImmediate(() => this.emit("close", null, signal ?? "SIGTERM"));
    return true;
  });
}

const SOX: RecorderInfo = { backend: "sox", binaryPath: "sox" };

function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

function harness(options: { spawnFails?: boolean; noRecorder?: boolean } = {}) {
  const recorders: FakeRecorder[] = [];
  const logger = memoryLogger();
  const capture = new AudioCaptureService({
    recorder: "sox",
    logger,
    amplitudeIntervalMs: 0,
    stopGraceMs: 200,
    detectRecorder: async () => (options.noRecorder ? undefined : SOX),
    spawnRecorder: () => {
      const rec = new FakeRecorder();
      recorders.push(rec);
      setImmediate(() => {
        if (options.spawnFails) {
          rec.emit("error", new Error("spawn sox ENOENT"));
        } else {
          rec.emit("spawn");
        }
      });
      return rec;
    }
  });
  return { capture, recorders, logger };
}

describe("AudioCaptureService", () => {
  it("returns the samples streamed between start and stop", async () => {
    const { capture, recorders } = harness();

    await capture.start();
    recorders[0].stdout.write(Buffer.alloc(600));
    recorders[0].stdout.write(Buffer.alloc(401));
    await tick();

    const chunk = await capture.stop();

    expect(chunk.pcm16.length).toBe(1000);
    expect(chunk.sampleRateHz).toBe(16000);
    expect(chunk.channels).toBe(1);
    expect(recorders[0].kill).toHaveBeenCalledWith("SIGTERM");
    expect((await capture.stop()).pcm16.length).toBe(0);
  });

  it("starts a single recorder when start is called twice", async () => {
    const { capture, recorders } = harness();

    await Promise.all([capture.start(), capture.start()]);
    await capture.stop();

    expect(recorders).toHaveLength(1);
  });

  it("returns an empty chunk when stopped without a recording", async () => {
    const { capture, recorders } = harness();

    const chunk = await capture.stop();

    expect(chunk.pcm16.length).toBe(0);
    expect(recorders).toHaveLength(0);
  });

  it("fails with DeviceUnavailableError when no recorder is installed", async () => {
    const { capture } = harness({ noRecorder: true });

    const started = capture.start();
    await expect(started).rejects.toBeInstanceOf(DeviceUnavailableError);
    await expect(started).rejects.toThrow('Configured recorder "sox" not found on PATH.');
  });

  it("fails with DeviceUnavailableError when the recorder cannot spawn", async () => {
    const { capture } = harness({ spawnFails: true });

    await expect(capture.start()).rejects.toThrow("Recording failed to start: spawn sox ENOENT");
    expect((await capture.stop()).pcm16.length).toBe(0);
  });

  it("reports a recorder that died before producing audio", async () => {
    const { capture, recorders } = harness();

    await capture.start();
    recorders[0].stderr.write("no default input device");
    await tick();
    recorders[0].emit("close", 1, null);

    await expect(capture.stop()).rejects.toThrow("Recording exited with code 1: no default input device");
  });

  it("keeps audio captured before an unexpected exit", async () => {
    const { capture, recorders, logger } = harness();

    await capture.start();
    recorders[0].stdout.write(Buffer.alloc(320));
    await tick();
    recorders[0].emit("close", 1, null);

    const chunk = await capture.stop();
    expect(chunk.pcm16.length).toBe(320);
    expect(logger.lines).toContain("warn Recording exited with code 1; keeping 320 bytes captured before the exit");
  });

  it("reports amplitude levels to the listener", async () => {
    const { capture, recorders } = harness();
    const levels: number[] = [];
    capture.setAmplitudeListener((level) => levels.push(level));

    await capture.start();
    const loud = Buffer.alloc(4);
    loud.writeInt16LE(16384, 0);
    loud.writeInt16LE(-16384, 2);
    recorders[0].stdout.write(loud);
    await tick();
    await tick();

    expect(levels).toEqual([0.5]);
    await capture.stop();
  });
});

describe("isExpectedExit", () => {
  it("accepts a clean exit", () => {
    expect(isExpectedExit("sox", false, 0, null)).toBe(true);
  });

  it("accepts termination after a requested stop", () => {
    expect(isExpectedExit("sox", true, null, "SIGTERM")).toBe(true);
    expect(isExpectedExit("arecord", true, 1, null)).toBe(true);
    expect(isExpectedExit("ffmpeg", true, 255, null)).toBe(true);
  });

  it("flags exits nobody asked for", () => {
    expect(isExpectedExit("arecord", false, 1, null)).toBe(false);
    expect(isExpectedExit("sox", false, null, "SIGKILL")).toBe(false);
  });
});

describe("buildRecorderArgs", () => {
  it("asks for raw 16 kHz mono signed 16-bit on stdout", () => {
    expect(buildRecorderArgs("arecord")).toEqual(["-q", "-f", "S16_LE", "-r", "16000", "-c", "1", "-t", "raw"]);
    expect(buildRecorderArgs("sox")).toEqual([
      "-q", "-d", "-t", "raw", "-r", "16000", "-c", "1", "-b", "16", "-e", "signed-integer", "-"
    ]);
  });
});
