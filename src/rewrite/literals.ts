const URL_PATTERN = /\b(?:https?:\/\/|www\.)[^\s<>"]+/gi;
const EMAIL_PATTERN = /\b[\w.+-]+@[\w-]+(?:\.[\w-]+)+\b/g;
const NUMBER_PATTERN = /\d(?:[\d,.:/-]*\d)?/g;
const TRAILING_PUNCTUATION = /[.,;:!?)\]}'"]+$/;

/**
 * Literal substrings a rewrite must carry over verbatim: URLs, e-mail
 * addresses and digit runs (numbers, dates, times).
 */
export function extractLiterals(text: string): string[] {
  const found = new Set<string>();
  let rest = text;

  for (const match of text.match(URL_PATTERN) ?? []) {
    found.add(match.replace(TRAILING_PUNCTUATION, ""));
    rest = rest.replace(match, " ");
  }
  for (const match of rest.match(EMAIL_PATTERN) ?? []) {
    found.add(match);
    rest = rest.replace(match, " ");
  }
  for (const match of rest.match(NUMBER_PATTERN) ?? []) {
    found.add(match);
  }

  return [...found];
}

export function missingLiterals(source: string, rewritten: string): string[] {
  return extractLiterals(source).filter((literal) => !rewritten.includes(literal));
}
