import type { RewriteInput } from "../types/contracts";
import { countWords } from "../util/text";

export const SYSTEM_PROMPT = [
  "You rewrite dictated speech transcripts.",
  "Rewrite without adding information.",
  "Preserve names, dates, numbers, URLs and email addresses exactly as written.",
  "If something is unclear, keep the original wording.",
  "Return only the rewritten text: no commentary, no markdown fences, no surrounding quotes."
].join(" ");

export type ChatMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string };

export function buildMessages(input: RewriteInput): ChatMessage[] {
  return [
    { role: "system", content: SYSTEM_PROMPT },
    {
      role: "user",
      content: `Style: ${input.styleInstruction}\n\nTranscript:\n${input.transcript}`
    }
  ];
}

export const REWRITE_TEMPERATURE = 0.2;

export function maxOutputTokens(transcript: string): number {
  return Math.max(countWords(transcript) * 3, 50);
}

/** Strips code fences and quotes that models sometimes wrap around the answer. */
export function cleanModelOutput(text: string): string {
  let cleaned = text.trim();
  const fenced = cleaned.match(/^```[\w-]*\n([\s\S]*?)\n?```$/);
  if (fenced) {
    cleaned = fenced[1].trim();
  }
  const quoted = cleaned.match(/^["'“‘]([\s\S]*)["'”’]$/);
  if (quoted && !/["“”]/.test(quoted[1])) {
    cleaned = quoted[1].trim();
  }
  return cleaned;
}
