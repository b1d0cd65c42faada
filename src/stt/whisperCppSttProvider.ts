import { randomBytes } from "node:crypto";
import { readFile, unlink, writeFile } from "node:fs/promises";
import { cpus, tmpdir } from "node:os";
import { join } from "node:path";
import { encodeWav } from "../audio/wav";
import { TranscriptionFailedError } from "../errors";
import { AudioChunk, ISttProvider, Logger, RawTranscript } from "../types/contracts";
import { binaryExists, CommandRunner, fileExists, runCommand } from "../util/exec";
import { normalizeTranscript } from "./transcript";

interface WhisperCppOptions {
  binaryPath: string;
  modelPath: string;
  language: string;
  timeoutMs: number;
  logger: Logger;
  runner?: CommandRunner;
  tempDir?: string;
}

export class WhisperCppSttProvider implements ISttProvider {
  private readonly runner: CommandRunner;

  constructor(private readonly options: WhisperCppOptions) {
    this.runner = options.runner ?? runCommand;
  }

  async transcribe(audio: AudioChunk): Promise<RawTranscript> {
    if (audio.pcm16.length === 0) {
      return { text: "" };
    }

    const outputBase = join(this.options.tempDir ?? tmpdir(), `ptt-dictation-${randomBytes(8).toString("hex")}`);
    const wavPath = `${outputBase}.wav`;
    const txtPath = `${outputBase}.txt`;

    try {
      await writeFile(wavPath, encodeWav(audio.pcm16, audio.sampleRateHz, audio.channels));

      const args = [
        "-m", this.options.modelPath,
        "-l", this.options.language,
        "-f", wavPath,
        "--output-txt",
        "--no-timestamps",
        "--no-prints",
        "-of", outputBase,
        "-t", String(Math.max(1, Math.min(cpus().length, 4))),
      ];

      try {
        await this.runner(this.options.binaryPath, args, { timeoutMs: this.options.timeoutMs });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new TranscriptionFailedError(`whisper-cli failed: ${message}`, { cause: error });
      }

      let raw: string;
      try {
        raw = await readFile(txtPath, "utf-8");
      } catch (error) {
        throw new TranscriptionFailedError("whisper-cli produced no output file", { cause: error });
      }

      const text = normalizeTranscript(raw);
      this.options.logger.info(`transcription complete: ${text.length} chars`);
      return { text };
    } finally {
      await Promise.all([removeFile(wavPath), removeFile(txtPath)]);
    }
  }
}

async function removeFile(path: string): Promise<void> {
  try {
    await unlink(path);
  } catch {
    // not created or already removed
  }
}

export async function findWhisperCppBinary(
  settingPath?: string
): Promise<string | undefined> {
  if (settingPath) {
    if (await fileExists(settingPath) || await binaryExists(settingPath)) {
      return settingPath;
    }
    return undefined;
  }

  for (const name of getWhisperCliNames()) {
    if (await binaryExists(name)) {
      return name;
    }
  }

  return undefined;
}

function getWhisperCliNames(): string[] {
  if (process.platform === "win32") {
    return ["whisper-cli.exe", "whisper-cpp.exe", "whisper.exe"];
  }
  return ["whisper-cli", "whisper-cpp", "whisper"];
}

export function whisperInstallHint(): string {
  if (process.platform === "darwin") {
    return "brew install whisper-cpp";
  }
  if (process.platform === "linux") {
    return "build whisper.cpp and put whisper-cli on PATH (github.com/ggerganov/whisper.cpp)";
  }
  return "download a release from github.com/ggerganov/whisper.cpp/releases";
}
