import type { MenuContext } from "./types";

/**
 * Ask a yes/no question until the answer is one of the two.
 * Resolves null when input closes.
 */
export async function confirm(ctx: Pick<MenuContext, "prompter" | "write">, question: string): Promise<boolean | null> {
  while (true) {
    const answer = await ctx.prompter.question(question);
    if (answer === null) return null;

    const normalized = answer.trim().toLowerCase();
    if (normalized === "yes" || normalized === "y") return true;
    if (normalized === "no" || normalized === "n") return false;
    ctx.write("Invalid input. Please respond with 'yes' or 'no'.");
  }
}

/** Prompt for a file path; an empty answer picks the default. */
export async function askPath(
  ctx: Pick<MenuContext, "prompter">,
  question: string,
  defaultPath: string,
): Promise<string | null> {
  const answer = await ctx.prompter.question(`${question} [${defaultPath}]: `);
  if (answer === null) return null;
  return answer.trim() || defaultPath;
}
