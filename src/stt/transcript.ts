const NON_SPEECH_MARKER = /\[[A-Z_ ]+\]|\((?:silence|music|noise|inaudible|blank_audio)\)/gi;

/** Flattens whisper output to one line and drops non-speech markers such as [BLANK_AUDIO]. */
export function normalizeTranscript(raw: string): string {
  return raw
    .replace(NON_SPEECH_MARKER, " ")
    .replace(/\s+/g, " ")
    .trim();
}
