import { askPath } from "../confirm";
import type { MenuEntry } from "../types";

export const viewLogsEntry: MenuEntry = {
  key: "6",
  label: "View Logs",
  aliases: ["logs"],
  run: async ({ log }) => {
    log.display();
    return "continue";
  },
};

export const saveLogsEntry: MenuEntry = {
  key: "7",
  label: "Save Logs",
  run: async (ctx) => {
    const path = await askPath(ctx, "Enter the file path to save logs", ctx.config.logPath);
    if (path === null) return "exit";
    ctx.log.save(path);
    return "continue";
  },
};
