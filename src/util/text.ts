export function sanitizeForLog(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

export function excerpt(text: string, max = 100): string {
  const clean = sanitizeForLog(text);
  return clean.length > max ? `${clean.slice(0, max)}...` : clean;
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

export function safeParseJson(value: string): unknown {
  try {
    return JSON.parse(value);
  } catch {
    return undefined;
  }
}
