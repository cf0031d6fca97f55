import type { ConversationLog } from "./conversation/log";
import type { KnowledgeStore } from "./knowledge/store";
import { normalizeInput } from "./normalize";

export interface ResponderDeps {
  store: KnowledgeStore;
  log: ConversationLog;
}

/** One chat turn: normalize, look up, record the exchange. */
export class Responder {
  private store: KnowledgeStore;
  private log: ConversationLog;

  constructor(deps: ResponderDeps) {
    this.store = deps.store;
    this.log = deps.log;
  }

  ask(rawInput: string): string {
    const input = normalizeInput(rawInput);
    const response = this.store.lookup(input);
    this.log.append(input, response);
    return response;
  }
}
