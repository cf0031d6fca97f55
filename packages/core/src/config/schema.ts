import { z } from "zod";
import { DEFAULT_KNOWLEDGE_FILE } from "../knowledge/types";

export const KeybotConfigSchema = z
  .object({
    $schema: z.string().optional(),

    botName: z.string().min(1).optional(),

    knowledge: z
      .object({
        path: z.string().min(1).optional(),
        autoLoad: z.boolean().optional(),
        saveOnAdd: z.boolean().optional(),
      })
      .strict()
      .optional(),

    log: z
      .object({
        path: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type KeybotConfig = z.infer<typeof KeybotConfigSchema>;

export const DEFAULT_LOG_FILE = "conversation.log";

export const DEFAULT_CONFIG: KeybotConfig = {
  botName: "MiniBot",
  knowledge: { path: DEFAULT_KNOWLEDGE_FILE, autoLoad: true, saveOnAdd: true },
  log: { path: DEFAULT_LOG_FILE },
};
