import { normalizeInput } from "@keybot/core";
import { confirm } from "../confirm";
import type { MenuEntry } from "../types";

export const chatEntry: MenuEntry = {
  key: "1",
  label: "Start Chatbot",
  aliases: ["chat"],
  run: async (ctx) => {
    const { config, prompter, responder, write } = ctx;
    write(`Hi! I'm ${config.botName}. Ask me anything, or type 'exit' to leave the chat.`);

    while (true) {
      const line = await prompter.question("You: ");
      if (line === null) return "exit";

      const input = normalizeInput(line);
      if (input === "") continue;
      if (input === "exit") {
        write("Leaving chat. Anything else I can do for you?");
        return "continue";
      }

      write(`${config.botName}: ${responder.ask(line)}`);

      const helpful = await confirm(ctx, "Was that helpful? (yes/no): ");
      if (helpful === null) return "exit";
      if (helpful) {
        write("Thank you for being with us.");
        return "continue";
      }
      write("How can I help you?");
    }
  },
};
