import type { Clock, LineWriter, StatusReporter } from "@keybot/core";
import { ConversationLog, KnowledgeStore, Responder } from "@keybot/core";
import type { AppConfig } from "./config";
import { createTerminalReporter } from "./reporter";

export interface RunnerOptions {
  /** Save the one-exchange log here after answering */
  saveLogTo?: string;
  write?: LineWriter;
  reporter?: StatusReporter;
  clock?: Clock;
}

/**
 * One-shot mode: load the knowledge file, answer or list, exit.
 * Returns a process exit code.
 */
export class NonInteractiveRunner {
  private store: KnowledgeStore;
  private write: LineWriter;
  private reporter: StatusReporter;

  constructor(
    private config: AppConfig,
    private options: RunnerOptions = {},
  ) {
    this.reporter = options.reporter ?? createTerminalReporter({ quiet: true });
    this.write = options.write ?? ((line) => console.log(line));
    this.store = new KnowledgeStore({ path: config.knowledgePath, reporter: this.reporter });
  }

  run(question: string): number {
    if (!this.loadKnowledge()) return 1;

    const log = new ConversationLog({ reporter: this.reporter, clock: this.options.clock, write: this.write });
    const responder = new Responder({ store: this.store, log });
    this.write(responder.ask(question));

    if (this.options.saveLogTo !== undefined) {
      return log.save(this.options.saveLogTo).status === "saved" ? 0 : 1;
    }
    return 0;
  }

  list(): number {
    if (!this.loadKnowledge()) return 1;

    const entries = this.store.all();
    if (entries.length === 0) {
      this.write("Knowledge base is empty.");
      return 0;
    }
    for (const { key, response } of entries) {
      this.write(`Input: ${key} | Response: ${response}`);
    }
    return 0;
  }

  /** A missing file is an empty store; a broken one is an error. */
  private loadKnowledge(): boolean {
    const result = this.store.load();
    return result.status === "loaded" || result.status === "not_found";
  }
}
