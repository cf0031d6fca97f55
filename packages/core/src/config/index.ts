export { CONFIG_FILENAME, loadKeybotConfig, mergeConfig } from "./loader";
export type { LoadConfigOptions } from "./loader";
export type { KeybotConfig } from "./schema";
export { DEFAULT_CONFIG, DEFAULT_LOG_FILE, KeybotConfigSchema } from "./schema";
