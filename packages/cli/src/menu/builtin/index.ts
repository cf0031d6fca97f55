import { MenuRegistry } from "../registry";
import { chatEntry } from "./chat";
import { addKnowledgeEntry, loadKnowledgeEntry, saveKnowledgeEntry, viewKnowledgeEntry } from "./knowledge";
import { saveLogsEntry, viewLogsEntry } from "./logs";
import { exitEntry } from "./misc";

export function registerBuiltinEntries(registry: MenuRegistry): MenuRegistry {
  return registry
    .register(chatEntry)
    .register(addKnowledgeEntry)
    .register(loadKnowledgeEntry)
    .register(saveKnowledgeEntry)
    .register(viewKnowledgeEntry)
    .register(viewLogsEntry)
    .register(saveLogsEntry)
    .register(exitEntry);
}

export function createMenuRegistry(): MenuRegistry {
  return registerBuiltinEntries(new MenuRegistry());
}
