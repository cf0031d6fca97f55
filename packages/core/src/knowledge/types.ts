export const DEFAULT_KNOWLEDGE_FILE = "knowledge_base.json";

/** Returned by lookup when no entry matches the key. */
export const FALLBACK_RESPONSE = "Sorry, I don't understand that.";

export interface KnowledgeEntry {
  key: string; // normalized input
  response: string;
}

export type LoadResult =
  | { status: "loaded"; path: string; count: number }
  | { status: "not_found"; path: string }
  | { status: "malformed"; path: string; reason: string }
  | { status: "read_failed"; path: string; reason: string };

export type SaveResult = { status: "saved"; path: string; count: number } | { status: "failed"; path: string; reason: string };
