// --- Primitives (raw ANSI codes) ---
const RESET = "\x1b[0m";

const RED = "\x1b[31m";
const GREEN = "\x1b[32m";
const YELLOW = "\x1b[33m";

// --- Semantic theme (exported) ---
export const t = {
  reset: RESET,

  success: GREEN, // saved / loaded notices
  error: RED,
  warn: YELLOW,
} as const;

/** Wrap text in a theme color, or return it untouched when color is off. */
export function paint(color: string, text: string, enabled = true): string {
  return enabled ? `${color}${text}${t.reset}` : text;
}
