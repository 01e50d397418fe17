import { EmptyCharsetError } from "./errors";

const ASCII_LOWERCASE = "abcdefghijklmnopqrstuvwxyz";
const ASCII_UPPERCASE = "ABCDEFGHIJKLMNOPQRSTUVWXYZ";
const DIGITS = "0123456789";

// Flag-format punctuation
const FLAG_SYMBOLS = "{}_";

export const DEFAULT_CHARSET = ASCII_LOWERCASE + ASCII_UPPERCASE + DIGITS + FLAG_SYMBOLS;

/**
 * Splits a charset string into candidate characters, keeping the first
 * occurrence of each. Order is preserved because it decides ties.
 */
export function normalizeCharset(charset: string): string[] {
  const seen = new Set<string>();
  const characters: string[] = [];

  for (const character of Array.from(charset)) {
    if (seen.has(character)) continue;
    seen.add(character);
    characters.push(character);
  }

  if (characters.length === 0) {
    throw new EmptyCharsetError();
  }

  return characters;
}
