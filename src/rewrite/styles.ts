export const STYLE_IDS = ["clean", "message", "email", "notes", "prompt"] as const;

export type StyleId = (typeof STYLE_IDS)[number];

export interface Style {
  id: StyleId;
  label: string;
  instruction: string;
}

export const STYLES: Record<StyleId, Style> = {
  clean: {
    id: "clean",
    label: "Clean",
    instruction:
      "Fix punctuation, capitalization and obvious transcription slips. Remove filler words " +
      "(um, uh, like, you know) and accidental repetitions. Keep the speaker's wording otherwise."
  },
  message: {
    id: "message",
    label: "Message",
    instruction:
      "Write it as a short, casual chat message. Conversational tone, contractions are fine, " +
      "no greeting or sign-off unless the speaker said one."
  },
  email: {
    id: "email",
    label: "Email",
    instruction:
      "Write it as a professional email body: full sentences, clear paragraphs, polite tone. " +
      "Keep any greeting or sign-off the speaker dictated; do not invent a subject line."
  },
  notes: {
    id: "notes",
    label: "Notes",
    instruction:
      "Turn it into concise structured notes: a bulleted list with one idea per bullet, " +
      "grouping related points. No introduction or summary line."
  },
  prompt: {
    id: "prompt",
    label: "Prompt",
    instruction:
      "Rewrite it as a clear instruction for an AI assistant: state the goal first, then " +
      "constraints and context as short sentences. Do not answer the request yourself."
  }
};

export function isStyleId(value: string): value is StyleId {
  return (STYLE_IDS as readonly string[]).includes(value);
}
