export { KnowledgeFileSchema, KnowledgeStore } from "./store";
export type { KnowledgeStoreOptions } from "./store";
export type { KnowledgeEntry, LoadResult, SaveResult } from "./types";
export { DEFAULT_KNOWLEDGE_FILE, FALLBACK_RESPONSE } from "./types";
