// Config
export type { KeybotConfig, LoadConfigOptions } from "./config/index";
export {
  CONFIG_FILENAME,
  DEFAULT_CONFIG,
  DEFAULT_LOG_FILE,
  KeybotConfigSchema,
  loadKeybotConfig,
  mergeConfig,
} from "./config/index";
// Conversation
export type { Clock, ConversationLogOptions, LineWriter, LogRecord } from "./conversation/index";
export { ConversationLog, formatLogRecord, formatTimestamp } from "./conversation/index";
// Knowledge
export type { KnowledgeEntry, KnowledgeStoreOptions, LoadResult, SaveResult } from "./knowledge/index";
export { DEFAULT_KNOWLEDGE_FILE, FALLBACK_RESPONSE, KnowledgeFileSchema, KnowledgeStore } from "./knowledge/index";
// Input
export { normalizeInput } from "./normalize";
// Responder
export type { ResponderDeps } from "./responder";
export { Responder } from "./responder";
// Status
export type { StatusLevel, StatusNotice, StatusReporter } from "./status/index";
export { consoleReporter, createCollectingReporter, describeError } from "./status/index";
