import log from "electron-log/node";
import type { Logger } from "../types/contracts";

export type LogLevel = "error" | "warn" | "info" | "debug";

export interface LoggingOptions {
  level: LogLevel;
  /** Console threshold; defaults to `level`. Raised while a status line owns the terminal. */
  consoleLevel?: LogLevel;
}

let configured = false;

export function configureLogging(options: LoggingOptions): void {
  log.transports.console.level = options.consoleLevel ?? options.level;
  log.transports.console.format = "{h}:{i}:{s} [{level}]{scope} {text}";
  log.transports.file.level = options.level;
  configured = true;
}

export function createLogger(scope: string): Logger {
  if (!configured) {
    configureLogging({ level: "info" });
  }
  const scoped = log.scope(scope);
  return {
    debug: (message) => scoped.debug(message),
    info: (message) => scoped.info(message),
    warn: (message) => scoped.warn(message),
    error: (message) => scoped.error(message)
  };
}
