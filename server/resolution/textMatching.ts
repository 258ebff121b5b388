/**
 * Phrase matching helpers shared by the deterministic resolver and the
 * intent parser. Both sides of a comparison go through normalizeForMatching,
 * so "CCTV maintenance contracts" and "cctv maintenance contract" agree.
 */

function stemToken(token: string): string {
  if (token.length > 4 && token.endsWith("ies")) return `${token.slice(0, -3)}y`;
  if (token.length > 4 && token.endsWith("s") && !token.endsWith("ss")) return token.slice(0, -1);
  return token;
}

/**
 * Lowercase, drop apostrophes, turn punctuation into spaces and strip a
 * plural "s" from longer words.
 */
export function normalizeForMatching(text: string): string {
  return text
    .toLowerCase()
    .replace(/['’`]/g, "")
    .replace(/[^a-z0-9&]+/g, " ")
    .trim()
    .split(" ")
    .filter(Boolean)
    .map(stemToken)
    .join(" ");
}

/** Whole-word phrase containment over normalized text. */
export function containsPhrase(normalizedText: string, normalizedPhrase: string): boolean {
  if (!normalizedPhrase) return false;
  return ` ${normalizedText} `.includes(` ${normalizedPhrase} `);
}

export function removePhrase(normalizedText: string, normalizedPhrase: string): string {
  if (!normalizedPhrase) return normalizedText;
  return ` ${normalizedText} `.split(` ${normalizedPhrase} `).join(" ").trim().replace(/\s+/g, " ");
}

export function tokens(normalizedText: string): string[] {
  return normalizedText ? normalizedText.split(" ") : [];
}
