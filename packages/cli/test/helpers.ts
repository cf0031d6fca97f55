import type { AppConfig } from "../src/config";
import type { Prompter } from "../src/prompter";

/** Prompter that replays scripted answers, then reports closed input. */
export class ScriptedPrompter implements Prompter {
  readonly prompts: string[] = [];
  closed = false;
  private answers: string[];

  constructor(answers: string[]) {
    this.answers = [...answers];
  }

  async question(prompt: string): Promise<string | null> {
    this.prompts.push(prompt);
    return this.answers.shift() ?? null;
  }

  close(): void {
    this.closed = true;
  }

  get remaining(): number {
    return this.answers.length;
  }
}

export function makeConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    botName: "TestBot",
    knowledgePath: "/nonexistent/knowledge.json",
    logPath: "/nonexistent/conversation.log",
    autoLoad: false,
    saveOnAdd: false,
    sources: [],
    ...overrides,
  };
}
