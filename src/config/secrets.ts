import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { errorMessage } from "../errors";
import type { Logger } from "../types/contracts";
import type { DictationSettings } from "./settings";

/**
 * Resolves the rewrite credential: the environment value wins, then the key
 * file. Returns undefined when neither yields a non-empty key.
 */
export async function resolveApiKey(
  settings: Pick<DictationSettings, "openAiApiKey" | "openAiApiKeyFile">,
  logger: Logger
): Promise<string | undefined> {
  if (settings.openAiApiKey) {
    return settings.openAiApiKey;
  }
  if (!settings.openAiApiKeyFile) {
    return undefined;
  }

  const path = settings.openAiApiKeyFile.replace(/^~(?=$|[\\/])/, homedir());
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    logger.warn(`cannot read OPENAI_API_KEY_FILE ${path}: ${errorMessage(error)}`);
    return undefined;
  }

  const key = raw.trim();
  if (!key) {
    logger.warn(`OPENAI_API_KEY_FILE ${path} is empty`);
    return undefined;
  }
  return key;
}
