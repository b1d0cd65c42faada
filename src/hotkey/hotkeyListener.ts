import { spawn } from "node:child_process";
import type { EventEmitter } from "node:events";
import * as readline from "node:readline";
import type { Readable } from "node:stream";
import type { Logger } from "../types/contracts";
import { safeParseJson } from "../util/text";

export type HotkeyRole = "talk" | "cycle" | "autopaste";
export type HotkeyEdgeType = "press" | "release";

export interface HotkeyEdge {
  type: HotkeyEdgeType;
  key: HotkeyRole;
}

export interface HotkeyListenerOptions {
  pythonPath: string;
  talkKey: string;
  cycleKey?: string;
  autoPasteKey?: string;
  restartDelayMs?: number;
}

interface ListenerEvent {
  event: string;
  key?: string;
  message?: string;
  keys?: Record<string, string>;
}

/** The slice of a child process the listener relies on. */
export interface ListenerProcess extends EventEmitter {
  stdout: Readable | null;
  stderr: Readable | null;
  readonly killed: boolean;
  kill(signal?: NodeJS.Signals): boolean;
}

export type ListenerSpawner = (pythonPath: string, script: string, env: NodeJS.ProcessEnv) => ListenerProcess;

// Edges are de-duplicated here so OS key auto-repeat never reaches Node.
const PYTHON_LISTENER_CODE = String.raw`
import json
import os
import sys


def emit(payload):
    sys.stdout.write(json.dumps(payload) + "\n")
    sys.stdout.flush()


try:
    from pynput import keyboard
except Exception:
    emit({"event": "error", "message": "Missing dependency: pynput (pip install pynput)"})
    sys.exit(2)


def resolve(name):
    name = name.strip().lower()
    if len(name) == 1:
        return keyboard.KeyCode.from_char(name)
    return getattr(keyboard.Key, name, None)


def normalize(key):
    if isinstance(key, keyboard.KeyCode) and key.char is not None:
        return keyboard.KeyCode.from_char(key.char.lower())
    return key


bindings = {}
names = {}
for role, var in (("talk", "HOTKEY_TALK"), ("cycle", "HOTKEY_CYCLE"), ("autopaste", "HOTKEY_AUTOPASTE")):
    name = os.environ.get(var, "").strip()
    if not name:
        continue
    key = resolve(name)
    if key is None:
        emit({"event": "error", "message": f"Unknown key name '{name}' for {var}"})
        sys.exit(2)
    bindings[key] = role
    names[role] = name

held = set()


def on_press(key):
    role = bindings.get(normalize(key))
    if role is None or role in held:
        return
    held.add(role)
    emit({"event": "press", "key": role})


def on_release(key):
    role = bindings.get(normalize(key))
    if role is None or role not in held:
        return
    held.discard(role)
    emit({"event": "release", "key": role})


emit({"event": "ready", "keys": names})
with keyboard.Listener(on_press=on_press, on_release=on_release) as listener:
    listener.join()
`;

const defaultSpawner: ListenerSpawner = (pythonPath, script, env) =>
  spawn(pythonPath, ["-u", "-c", script], { stdio: ["ignore", "pipe", "pipe"], env });

/**
 * Global push-to-talk key listener backed by a pynput helper process that
 * prints one JSON object per line. The line handler only forwards edges.
 */
export class HotkeyListener {
  private proc: ListenerProcess | undefined;
  private isDisposed = false;
  private restartTimer: NodeJS.Timeout | undefined;

  constructor(
    private readonly options: HotkeyListenerOptions,
    private readonly onEdge: (edge: HotkeyEdge) => void,
    private readonly logger: Logger,
    private readonly spawner: ListenerSpawner = defaultSpawner
  ) {}

  start(): void {
    if (this.isDisposed || this.proc) {
      return;
    }

    const env: NodeJS.ProcessEnv = {
      ...process.env,
      HOTKEY_TALK: this.options.talkKey,
      HOTKEY_CYCLE: this.options.cycleKey ?? "",
      HOTKEY_AUTOPASTE: this.options.autoPasteKey ?? ""
    };

    const proc = this.spawner(this.options.pythonPath, PYTHON_LISTENER_CODE, env);
    this.proc = proc;
    this.logger.info(`key listener started (python=${this.options.pythonPath}, talk=${this.options.talkKey})`);

    if (proc.stdout) {
      const rl = readline.createInterface({ input: proc.stdout });
      rl.on("line", (line) => this.handleLine(line));
      proc.once("exit", () => rl.close());
    }

    if (proc.stderr) {
      const rlErr = readline.createInterface({ input: proc.stderr });
      rlErr.on("line", (line) => {
        const text = line.trim();
        if (text) this.logger.warn(`listener stderr: ${text}`);
      });
      proc.once("exit", () => rlErr.close());
    }

    proc.once("error", (error: Error) => {
      this.logger.error(`key listener failed to start ${this.options.pythonPath}: ${error.message}`);
      if (this.proc === proc) {
        this.proc = undefined;
      }
    });

    proc.once("exit", (code: number | null, signal: NodeJS.Signals | null) => {
      if (this.proc === proc) {
        this.proc = undefined;
      }
      if (this.isDisposed) {
        return;
      }
      this.logger.warn(
        `key listener exited (code=${code}, signal=${signal ?? "none"}), restarting in ${this.restartDelayMs()}ms`
      );
      this.scheduleRestart();
    });
  }

  dispose(): void {
    this.isDisposed = true;
    if (this.restartTimer) {
      clearTimeout(this.restartTimer);
      this.restartTimer = undefined;
    }
    if (this.proc && !this.proc.killed) {
      this.proc.kill();
    }
    this.proc = undefined;
  }

  private handleLine(line: string): void {
    const trimmed = line.trim();
    if (!trimmed) return;

    const event = safeParseJson(trimmed);
    if (!isListenerEvent(event)) {
      this.logger.warn(`listener unexpected output: ${trimmed}`);
      return;
    }

    switch (event.event) {
      case "press":
      case "release":
        if (isRole(event.key)) {
          this.onEdge({ type: event.event, key: event.key });
        }
        return;
      case "ready":
        this.logger.info(`key listener ready (${formatKeys(event.keys)})`);
        return;
      case "error":
        this.logger.error(`key listener disabled: ${event.message ?? "unknown error"}`);
        this.dispose();
        return;
      default:
        return;
    }
  }

  private restartDelayMs(): number {
    return this.options.restartDelayMs ?? 3000;
  }

  private scheduleRestart(): void {
    if (this.isDisposed || this.restartTimer) {
      return;
    }

    this.restartTimer = setTimeout(() => {
      this.restartTimer = undefined;
      if (!this.isDisposed) {
        this.start();
      }
    }, this.restartDelayMs());
  }
}

function isListenerEvent(value: unknown): value is ListenerEvent {
  if (!value || typeof value !== "object" || !("event" in value) || typeof value.event !== "string") {
    return false;
  }
  return !("keys" in value) || isStringRecord(value.keys);
}

function isStringRecord(value: unknown): value is Record<string, string> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every((v) => typeof v === "string");
}

function isRole(value: unknown): value is HotkeyRole {
  return value === "talk" || value === "cycle" || value === "autopaste";
}

function formatKeys(keys: Record<string, string> | undefined): string {
  if (!keys) return "no keys";
  return Object.entries(keys)
    .map(([role, name]) => `${role}=${name}`)
    .join(", ");
}
