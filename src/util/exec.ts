import { execFile, spawn } from "node:child_process";
import { access } from "node:fs/promises";

export interface RunOptions {
  input?: string;
  timeoutMs?: number;
  env?: NodeJS.ProcessEnv;
}

export interface RunResult {
  stdout: string;
  stderr: string;
}

/** Failure of an external command: nonzero exit, spawn error or timeout. */
export class CommandError extends Error {
  constructor(
    message: string,
    readonly file: string,
    readonly exitCode: number | null,
    readonly stderr: string,
    readonly timedOut: boolean
  ) {
    super(message);
    this.name = "CommandError";
  }
}

export type CommandRunner = (file: string, args: string[], options?: RunOptions) => Promise<RunResult>;

export const runCommand: CommandRunner = (file, args, options = {}) => {
  if (options.input !== undefined) {
    return runWithInput(file, args, options.input, options);
  }

  return new Promise((resolve, reject) => {
    execFile(
      file,
      args,
      { timeout: options.timeoutMs, env: options.env, maxBuffer: 16 * 1024 * 1024 },
      (error, stdout, stderr) => {
        if (error) {
          const timedOut = error.killed === true && error.signal === "SIGTERM" && options.timeoutMs !== undefined;
          const detail = stderr?.slice(0, 300).trim() || error.message;
          reject(
            new CommandError(
              timedOut ? `${file} timed out after ${options.timeoutMs}ms` : `${file} failed: ${detail}`,
              file,
              typeof error.code === "number" ? error.code : null,
              stderr ?? "",
              timedOut
            )
          );
          return;
        }
        resolve({ stdout, stderr });
      }
    );
  });
};

// Output still buffered in the pipes when the process exits gets this long to arrive.
const EXIT_DRAIN_MS = 200;

/**
 * Settles on exit rather than on close: clipboard tools such as xclip fork a
 * child that keeps serving the selection and holds the inherited pipes open.
 */
function runWithInput(file: string, args: string[], input: string, options: RunOptions): Promise<RunResult> {
  return new Promise((resolve, reject) => {
    const proc = spawn(file, args, { stdio: ["pipe", "pipe", "pipe"], env: options.env });
    let stdout = "";
    let stderr = "";
    let settled = false;
    let drainTimer: NodeJS.Timeout | undefined;

    const settle = (error: CommandError | undefined): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      clearTimeout(drainTimer);
      proc.stdout.destroy();
      proc.stderr.destroy();
      if (error) {
        reject(error);
      } else {
        resolve({ stdout, stderr });
      }
    };

    const timer =
      options.timeoutMs === undefined
        ? undefined
        : setTimeout(() => {
            proc.kill("SIGTERM");
            settle(new CommandError(`${file} timed out after ${options.timeoutMs}ms`, file, null, stderr, true));
          }, options.timeoutMs);

    proc.stdout.on("data", (chunk: Buffer) => (stdout += chunk.toString()));
    proc.stderr.on("data", (chunk: Buffer) => (stderr += chunk.toString()));

    proc.once("error", (err) => {
      settle(new CommandError(`${file} failed to start: ${err.message}`, file, null, stderr, false));
    });

    const finish = (code: number | null): void => {
      if (code === 0) {
        settle(undefined);
        return;
      }
      const detail = stderr.slice(0, 300).trim() || `exit code ${code}`;
      settle(new CommandError(`${file} failed: ${detail}`, file, code, stderr, false));
    };

    proc.once("exit", (code) => {
      drainTimer = setTimeout(() => finish(code), EXIT_DRAIN_MS);
    });
    proc.once("close", (code) => finish(code));

    proc.stdin.on("error", () => {
      // EPIPE when the process exits early; the exit handler reports it
    });
    proc.stdin.end(input);
  });
}

export function binaryExists(name: string): Promise<boolean> {
  const cmd = process.platform === "win32" ? "where" : "which";
  return new Promise((resolve) => {
    execFile(cmd, [name], (err) => resolve(!err));
  });
}

export function fileExists(path: string): Promise<boolean> {
  return access(path)
    .then(() => true)
    .catch(() => false);
}
