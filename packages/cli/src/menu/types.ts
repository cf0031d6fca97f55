import type { ConversationLog, KnowledgeStore, LineWriter, Responder } from "@keybot/core";
import type { AppConfig } from "../config";
import type { Prompter } from "../prompter";
import type { MenuRegistry } from "./registry";

/** "exit" ends the program; "continue" returns to the menu. */
export type MenuOutcome = "continue" | "exit";

export interface MenuEntry {
  /** Choice typed at the menu prompt, e.g. "1" */
  key: string;
  label: string;
  /** Alternate words accepted for the choice (e.g. quit → Exit) */
  aliases?: string[];
  run: (ctx: MenuContext) => Promise<MenuOutcome>;
}

/**
 * Everything a menu action may touch. The store, log and responder are
 * independent references; actions never reach through one to find another.
 */
export interface MenuContext {
  config: AppConfig;
  store: KnowledgeStore;
  log: ConversationLog;
  responder: Responder;
  prompter: Prompter;
  write: LineWriter;
  registry: MenuRegistry;
}
