import { readFileSync, writeFileSync } from "node:fs";
import { getNodeValue, type ParseError, parseTree, printParseErrorCode } from "jsonc-parser";
import { z } from "zod";
import { consoleReporter, describeError } from "../status/reporter";
import type { StatusReporter } from "../status/types";
import { DEFAULT_KNOWLEDGE_FILE, FALLBACK_RESPONSE, type KnowledgeEntry, type LoadResult, type SaveResult } from "./types";

/** On-disk shape: a flat object of input → response strings, as entries in file order. */
export const KnowledgeFileSchema = z.array(z.tuple([z.string(), z.string()]));

const INDENT = "    ";

export interface KnowledgeStoreOptions {
  /** Default path for load() and save() when none is given */
  path?: string;
  reporter?: StatusReporter;
}

/**
 * In-memory mapping from canonical key to response, backed by a JSON file.
 * The mapping is authoritative; the file only reflects it as of the last
 * explicit load() or save(). No cross-process locking.
 */
export class KnowledgeStore {
  readonly path: string;
  private responses = new Map<string, string>();
  private reporter: StatusReporter;

  constructor(options: KnowledgeStoreOptions = {}) {
    this.path = options.path ?? DEFAULT_KNOWLEDGE_FILE;
    this.reporter = options.reporter ?? consoleReporter;
  }

  get size(): number {
    return this.responses.size;
  }

  has(key: string): boolean {
    return this.responses.has(key);
  }

  lookup(key: string): string {
    return this.responses.get(key) ?? FALLBACK_RESPONSE;
  }

  /** Insert or overwrite. Does not persist. */
  add(key: string, response: string): void {
    this.responses.set(key, response);
  }

  all(): KnowledgeEntry[] {
    return [...this.responses].map(([key, response]) => ({ key, response }));
  }

  /**
   * Merge a knowledge file into the mapping. Loaded keys overwrite existing
   * ones; keys absent from the file are kept. A missing, unreadable or
   * malformed file leaves the mapping untouched.
   */
  load(path: string = this.path): LoadResult {
    let text: string;
    try {
      text = readFileSync(path, "utf-8");
    } catch (err) {
      if (isNotFound(err)) {
        this.reporter.warn(`Knowledge file '${path}' not found. Starting fresh.`);
        return { status: "not_found", path };
      }
      const reason = describeError(err);
      this.reporter.error(`Error reading knowledge file '${path}': ${reason}`);
      return { status: "read_failed", path, reason };
    }

    const parsed = parseKnowledgeFile(text);
    if (!parsed.ok) {
      this.reporter.error(`Error decoding knowledge file '${path}': ${parsed.reason}`);
      return { status: "malformed", path, reason: parsed.reason };
    }

    for (const [key, response] of parsed.entries) {
      this.responses.set(key, response);
    }
    this.reporter.info(`Knowledge base loaded from ${path} (${parsed.entries.length} entries).`);
    return { status: "loaded", path, count: parsed.entries.length };
  }

  /** Write the whole mapping as pretty-printed JSON. Never throws. */
  save(path: string = this.path): SaveResult {
    const body = serializeKnowledge([...this.responses]);
    try {
      writeFileSync(path, body, "utf-8");
    } catch (err) {
      const reason = describeError(err);
      this.reporter.error(`Error saving knowledge to '${path}': ${reason}`);
      return { status: "failed", path, reason };
    }
    this.reporter.info(`Knowledge base saved to ${path}.`);
    return { status: "saved", path, count: this.responses.size };
  }
}

/** Pretty-printed JSON object, keys in mapping order (integer-like keys included). */
function serializeKnowledge(entries: [string, string][]): string {
  if (entries.length === 0) return "{}\n";
  const lines = entries.map(([key, response]) => `${INDENT}${JSON.stringify(key)}: ${JSON.stringify(response)}`);
  return `{\n${lines.join(",\n")}\n}\n`;
}

type ParsedKnowledge = { ok: true; entries: [string, string][] } | { ok: false; reason: string };

/**
 * Strict JSON, read as a syntax tree so entries keep their file order and
 * keys such as "__proto__" stay plain data.
 */
function parseKnowledgeFile(text: string): ParsedKnowledge {
  const errors: ParseError[] = [];
  const root = parseTree(text, errors, { disallowComments: true, allowTrailingComma: false, allowEmptyContent: false });
  if (errors.length > 0 || !root) {
    const first = errors[0];
    return {
      ok: false,
      reason: first ? `${printParseErrorCode(first.error)} at offset ${first.offset}` : "Empty knowledge file",
    };
  }
  if (root.type !== "object") {
    return { ok: false, reason: `Expected object, received ${root.type}` };
  }

  const pairs: unknown[] = (root.children ?? []).map((property) => {
    const [keyNode, valueNode] = property.children ?? [];
    return [keyNode?.value, valueNode ? getNodeValue(valueNode) : undefined];
  });

  const result = KnowledgeFileSchema.safeParse(pairs);
  if (!result.success) {
    const issue = result.error.issues[0];
    const index = issue?.path[0];
    const key = typeof index === "number" ? pairKey(pairs[index]) : undefined;
    const where = key !== undefined ? ` at "${key}"` : "";
    return { ok: false, reason: `${issue?.message ?? "Invalid knowledge file"}${where}` };
  }
  return { ok: true, entries: result.data };
}

function pairKey(pair: unknown): string | undefined {
  return Array.isArray(pair) && typeof pair[0] === "string" ? pair[0] : undefined;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
