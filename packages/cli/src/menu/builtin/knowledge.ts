import { normalizeInput } from "@keybot/core";
import { askPath, confirm } from "../confirm";
import type { MenuEntry } from "../types";

export const addKnowledgeEntry: MenuEntry = {
  key: "2",
  label: "Add Knowledge",
  aliases: ["add"],
  run: async (ctx) => {
    const { config, prompter, store, write } = ctx;

    while (true) {
      const input = await prompter.question("Enter the user input: ");
      if (input === null) return "exit";
      const response = await prompter.question("Enter the chatbot's response: ");
      if (response === null) return "exit";

      const key = normalizeInput(input);
      const existed = store.has(key);
      store.add(key, response.trim());
      write(existed ? `Updated response for "${key}".` : `Added response for "${key}".`);
      if (config.saveOnAdd) store.save();

      const again = await confirm(ctx, "Add another? (yes/no): ");
      if (again === null) return "exit";
      if (!again) return "continue";
    }
  },
};

export const loadKnowledgeEntry: MenuEntry = {
  key: "3",
  label: "Load Knowledge",
  aliases: ["load"],
  run: async (ctx) => {
    const path = await askPath(ctx, "Enter the file path to load knowledge", ctx.store.path);
    if (path === null) return "exit";
    ctx.store.load(path);
    return "continue";
  },
};

export const saveKnowledgeEntry: MenuEntry = {
  key: "4",
  label: "Save Knowledge",
  aliases: ["save"],
  run: async (ctx) => {
    const path = await askPath(ctx, "Enter the file path to save knowledge", ctx.store.path);
    if (path === null) return "exit";
    ctx.store.save(path);
    return "continue";
  },
};

export const viewKnowledgeEntry: MenuEntry = {
  key: "5",
  label: "View Knowledge",
  aliases: ["view"],
  run: async ({ store, write }) => {
    const entries = store.all();
    if (entries.length === 0) {
      write("Knowledge base is empty.");
      return "continue";
    }
    write("Current Knowledge Base:");
    for (const { key, response } of entries) {
      write(`Input: ${key} | Response: ${response}`);
    }
    return "continue";
  },
};
