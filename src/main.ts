#!/usr/bin/env node
import { config as loadEnv } from "dotenv";
import { parseArgs } from "node:util";
import { DictationApp } from "./app";
import { readSettings } from "./config/settings";
import { DictationError, errorMessage } from "./errors";
import { configureLogging, createLogger } from "./logging/logger";
import { STYLES, STYLE_IDS, isStyleId } from "./rewrite/styles";
import { MODELS, ModelManager } from "./stt/modelManager";

const USAGE = `Usage: ptt-dictation [command] [options]

Commands:
  run                    Listen for the push-to-talk key (default)
  styles                 List rewrite styles
  download-model [name]  Fetch a whisper.cpp model (${Object.keys(MODELS).join(", ")})

Options:
  --style <id>           Start with this style instead of MODE
  --auto-paste           Paste into the focused window after copying
  --headless             No status line
  -h, --help             Show this help

Configuration is read from the environment and from .env in the working directory.`;

async function main(argv: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      style: { type: "string" },
      "auto-paste": { type: "boolean" },
      headless: { type: "boolean" },
      help: { type: "boolean", short: "h" }
    }
  });

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const [command = "run", ...rest] = positionals;

  if (command === "styles") {
    for (const id of STYLE_IDS) {
      console.log(`${id.padEnd(8)} ${STYLES[id].instruction}`);
    }
    return 0;
  }

  loadEnv();
  const settings = readSettings();

  if (values.style !== undefined) {
    if (!isStyleId(values.style)) {
      console.error(`Unknown style "${values.style}". Available: ${STYLE_IDS.join(", ")}`);
      return 1;
    }
    settings.defaultStyle = values.style;
  }
  if (values["auto-paste"]) {
    settings.autoPaste = true;
  }
  if (values.headless) {
    settings.overlay = "none";
  }

  if (command === "download-model") {
    configureLogging({ level: settings.logLevel });
    const modelPath = await new ModelManager(settings.sttModelDir, createLogger("models")).ensureModel(
      rest[0] ?? settings.sttModel
    );
    console.log(modelPath);
    return 0;
  }

  if (command !== "run") {
    console.error(`Unknown command "${command}".\n\n${USAGE}`);
    return 1;
  }

  const statusLineOwnsTerminal = settings.overlay === "terminal" && process.stderr.isTTY === true;
  configureLogging({
    level: settings.logLevel,
    consoleLevel: statusLineOwnsTerminal ? "warn" : settings.logLevel
  });

  const app = await DictationApp.create(settings, createLogger);
  await app.start();

  return new Promise<number>((resolve) => {
    const shutdown = (): void => {
      app.stop().then(
        () => resolve(0),
        (error: unknown) => {
          console.error(`Shutdown failed: ${errorMessage(error)}`);
          resolve(1);
        }
      );
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
  });
}

main(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (error: unknown) => {
    if (error instanceof DictationError) {
      console.error(error.message);
    } else {
      console.error(`ptt-dictation failed: ${errorMessage(error)}`);
    }
    process.exit(1);
  }
);
