import { describe, expect, it } from "vitest";
import { CommandError, runCommand } from "../../src/util/exec";

const NODE = process.execPath;

async function failure(pending: Promise<unknown>): Promise<CommandError> {
  const error = await pending.then(
    () => undefined,
    (e: unknown) => e
  );
  if (!(error instanceof CommandError)) {
    throw new Error(`expected a CommandError, got ${String(error)}`);
  }
  return error;
}

describe("runCommand", () => {
  it("returns stdout of a successful run", async () => {
    await expect(runCommand(NODE, ["-e", "process.stdout.write('ok')"])).resolves.toEqual({ stdout: "ok", stderr: "" });
  });

  it("reports the exit code and stderr of a failed run", async () => {
    const error = await failure(runCommand(NODE, ["-e", "process.stderr.write('boom'); process.exit(3)"]));

    expect(error.exitCode).toBe(3);
    expect(error.timedOut).toBe(false);
    expect(error.message).toBe(`${NODE} failed: boom`);
  });

  it("marks a run killed by the timeout", async () => {
    const error = await failure(runCommand(NODE, ["-e", "setTimeout(() => {}, 5000)"], { timeoutMs: 200 }));

    expect(error.timedOut).toBe(true);
    expect(error.message).toBe(`${NODE} timed out after 200ms`);
  });

  describe("with input", () => {
    it("writes the input to stdin", async () => {
      const result = await runCommand(NODE, ["-e", "process.stdin.pipe(process.stdout)"], { input: "hello" });

      expect(result.stdout).toBe("hello");
    });

    it("reports a nonzero exit", async () => {
      const script = "process.stdin.resume(); process.stdin.on('end', () => { process.stderr.write('no display'); process.exit(1); })";
      const error = await failure(runCommand(NODE, ["-e", script], { input: "x" }));

      expect(error.exitCode).toBe(1);
      expect(error.message).toBe(`${NODE} failed: no display`);
    });

    it("settles when the tool exits while a forked child keeps its pipes open", async () => {
      // the child inherits stdout/stderr and outlives the tool, like xclip serving the selection
      const script = [
        "process.stdin.resume();",
        "process.stdin.on('end', () => {",
        "  const { spawn } = require('node:child_process');",
        "  spawn(process.execPath, ['-e', 'setTimeout(() => {}, 3000)'], { stdio: ['ignore', 'inherit', 'inherit'] }).unref();",
        "  process.exit(0);",
        "});"
      ].join("\n");
      const started = Date.now();

      await expect(runCommand(NODE, ["-e", script], { input: "copied text", timeoutMs: 2500 })).resolves.toEqual({
        stdout: "",
        stderr: ""
      });
      expect(Date.now() - started).toBeLessThan(2000);
    });

    it("rejects at the timeout even if the pipes stay open", async () => {
      const script = "process.stdin.resume(); setInterval(() => {}, 1000);";
      const started = Date.now();

      const error = await failure(runCommand(NODE, ["-e", script], { input: "x", timeoutMs: 200 }));

      expect(error.timedOut).toBe(true);
      expect(Date.now() - started).toBeLessThan(1500);
    });
  });
});
