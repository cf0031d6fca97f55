import type { Clock, LineWriter, StatusReporter } from "@keybot/core";
import { ConversationLog, KnowledgeStore, normalizeInput, Responder } from "@keybot/core";
import type { AppConfig } from "./config";
import type { MenuContext, MenuRegistry } from "./menu/index";
import { createMenuRegistry } from "./menu/index";
import type { Prompter } from "./prompter";
import { createTerminalReporter } from "./reporter";

export interface AppOptions {
  prompter: Prompter;
  write?: LineWriter;
  reporter?: StatusReporter;
  clock?: Clock;
  registry?: MenuRegistry;
}

/**
 * Interactive session: a start/exit greeting, then the numbered menu.
 * Owns the wiring of store, log and responder for one run.
 */
export class App {
  readonly store: KnowledgeStore;
  readonly log: ConversationLog;
  readonly responder: Responder;
  private registry: MenuRegistry;
  private prompter: Prompter;
  private write: LineWriter;

  constructor(
    private config: AppConfig,
    options: AppOptions,
  ) {
    const reporter = options.reporter ?? createTerminalReporter();
    this.prompter = options.prompter;
    this.write = options.write ?? ((line) => console.log(line));
    this.registry = options.registry ?? createMenuRegistry();

    this.store = new KnowledgeStore({ path: config.knowledgePath, reporter });
    this.log = new ConversationLog({ reporter, clock: options.clock, write: this.write });
    this.responder = new Responder({ store: this.store, log: this.log });
  }

  async start(): Promise<void> {
    if (this.config.autoLoad) {
      this.store.load();
    }

    try {
      this.write(`Hi! I'm ${this.config.botName}. Type 'start' to begin or 'exit' to quit.`);
      while (true) {
        const line = await this.prompter.question("> ");
        if (line === null) return;

        const choice = normalizeInput(line);
        if (choice === "start") {
          await this.runMenu();
          return;
        }
        if (choice === "exit") {
          this.write("Have a good day!");
          return;
        }
        this.write("Please type 'start' to begin or 'exit' to quit.");
      }
    } finally {
      this.prompter.close();
    }
  }

  private async runMenu(): Promise<void> {
    const ctx: MenuContext = {
      config: this.config,
      store: this.store,
      log: this.log,
      responder: this.responder,
      prompter: this.prompter,
      write: this.write,
      registry: this.registry,
    };

    while (true) {
      this.write("");
      for (const line of this.registry.render()) {
        this.write(line);
      }

      const choice = await this.prompter.question("Enter your choice: ");
      if (choice === null) return;

      const entry = this.registry.get(choice);
      if (!entry) {
        this.write("Invalid choice. Please try again.");
        continue;
      }
      if ((await entry.run(ctx)) === "exit") return;
    }
  }
}
