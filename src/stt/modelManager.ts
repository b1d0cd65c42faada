import { join } from "node:path";
import { mkdir, rename, unlink } from "node:fs/promises";
import { createWriteStream } from "node:fs";
import { Dispatcher, request } from "undici";
import { ConfigError } from "../errors";
import type { Logger } from "../types/contracts";
import { fileExists } from "../util/exec";

const MODEL_BASE_URL =
  "https://huggingface.co/ggerganov/whisper.cpp/resolve/main";

export const MODELS: Record<string, { filename: string; sizeMB: number }> = {
  "tiny.en": { filename: "ggml-tiny.en.bin", sizeMB: 75 },
  tiny: { filename: "ggml-tiny.bin", sizeMB: 75 },
  "base.en": { filename: "ggml-base.en.bin", sizeMB: 142 },
  base: { filename: "ggml-base.bin", sizeMB: 142 },
  "small.en": { filename: "ggml-small.en.bin", sizeMB: 466 },
  small: { filename: "ggml-small.bin", sizeMB: 466 },
};

const MAX_REDIRECTS = 5;

export class ModelManager {
  constructor(
    private readonly storageDir: string,
    private readonly logger: Logger
  ) {}

  async ensureModel(modelName: string): Promise<string> {
    const info = MODELS[modelName];
    if (!info) {
      throw new ConfigError([
        `WHISPER_MODEL: unknown model "${modelName}" (available: ${Object.keys(MODELS).join(", ")})`,
      ]);
    }

    const modelPath = join(this.storageDir, info.filename);

    if (await fileExists(modelPath)) {
      return modelPath;
    }

    await mkdir(this.storageDir, { recursive: true });

    const url = `${MODEL_BASE_URL}/${info.filename}`;
    await this.downloadWithProgress(url, modelPath, info.filename, info.sizeMB);

    return modelPath;
  }

  private async downloadWithProgress(
    url: string,
    destPath: string,
    filename: string,
    sizeMB: number
  ): Promise<void> {
    this.logger.info(`downloading ${filename} (~${sizeMB}MB) to ${this.storageDir}`);

    const res = await requestFollowingRedirects(url, MAX_REDIRECTS);

    const totalBytes = Number(res.headers["content-length"] || 0);
    const partialPath = `${destPath}.part`;
    const writer = createWriteStream(partialPath);
    let downloaded = 0;
    let lastReportedPct = 0;

    try {
      for await (const chunk of res.body) {
        const buf: Buffer = chunk;
        if (!writer.write(buf)) {
          await new Promise<void>((resolve) => writer.once("drain", resolve));
        }
        downloaded += buf.length;
        if (totalBytes > 0) {
          const pct = Math.floor((downloaded / totalBytes) * 100);
          if (pct >= lastReportedPct + 10) {
            lastReportedPct = pct - (pct % 10);
            this.logger.info(`${filename}: ${lastReportedPct}%`);
          }
        }
      }

      await new Promise<void>((resolve, reject) => {
        writer.on("error", reject);
        writer.end(() => resolve());
      });
    } catch (error) {
      writer.destroy();
      await unlink(partialPath).catch(() => undefined);
      throw error;
    }

    await rename(partialPath, destPath);
    this.logger.info(`${filename} saved (${(downloaded / 1024 / 1024).toFixed(1)}MB)`);
  }
}

async function requestFollowingRedirects(
  url: string,
  redirectsLeft: number
): Promise<Dispatcher.ResponseData> {
  const res = await request(url, { method: "GET" });
  if (res.statusCode >= 300 && res.statusCode < 400) {
    const location = res.headers.location;
    await res.body.dump();
    const next = Array.isArray(location) ? location[0] : location;
    if (!next || redirectsLeft <= 0) {
      throw new Error(`Download failed: redirect without usable location (HTTP ${res.statusCode})`);
    }
    return requestFollowingRedirects(new URL(next, url).toString(), redirectsLeft - 1);
  }
  if (res.statusCode < 200 || res.statusCode >= 300) {
    await res.body.dump();
    throw new Error(`Download failed: HTTP ${res.statusCode}`);
  }
  return res;
}
