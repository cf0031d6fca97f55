/**
 * Canonical lookup key for raw user text.
 * Exact-match only: internal whitespace and punctuation are kept, so
 * "hello  there" and "hello there" are different keys.
 */
export function normalizeInput(text: string): string {
  return text.toLowerCase().trim();
}
