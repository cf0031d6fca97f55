import type { MenuEntry } from "../types";

export const exitEntry: MenuEntry = {
  key: "8",
  label: "Exit",
  aliases: ["exit", "quit", "q"],
  run: async ({ write }) => {
    write("Goodbye!");
    return "exit";
  },
};
