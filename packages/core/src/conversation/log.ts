import { writeFileSync } from "node:fs";
import type { SaveResult } from "../knowledge/types";
import { consoleReporter, describeError } from "../status/reporter";
import type { StatusReporter } from "../status/types";
import { formatLogRecord } from "./format";
import type { Clock, LineWriter, LogRecord } from "./types";

export interface ConversationLogOptions {
  reporter?: StatusReporter;
  clock?: Clock;
  /** Sink for display() */
  write?: LineWriter;
}

/**
 * Append-only record of the exchanges in one run.
 * Kept in memory; written to disk only by save().
 */
export class ConversationLog {
  private entries: LogRecord[] = [];
  private reporter: StatusReporter;
  private clock: Clock;
  private write: LineWriter;

  constructor(options: ConversationLogOptions = {}) {
    this.reporter = options.reporter ?? consoleReporter;
    this.clock = options.clock ?? (() => new Date());
    this.write = options.write ?? ((line) => console.log(line));
  }

  get size(): number {
    return this.entries.length;
  }

  append(input: string, output: string): LogRecord {
    const timestamp = new Date(this.clock().getTime());
    timestamp.setMilliseconds(0);
    const record: LogRecord = Object.freeze({ timestamp, input, output });
    this.entries.push(record);
    return record;
  }

  records(): LogRecord[] {
    return [...this.entries];
  }

  save(path: string): SaveResult {
    const body = this.entries.map((record) => `${formatLogRecord(record)}\n`).join("");
    try {
      writeFileSync(path, body, "utf-8");
    } catch (err) {
      const reason = describeError(err);
      this.reporter.error(`Error saving logs to '${path}': ${reason}`);
      return { status: "failed", path, reason };
    }
    this.reporter.info(`Logs saved to ${path}.`);
    return { status: "saved", path, count: this.entries.length };
  }

  display(): void {
    if (this.entries.length === 0) {
      this.write("No logs available.");
      return;
    }
    this.write("Conversation Logs:");
    for (const record of this.entries) {
      this.write(formatLogRecord(record));
    }
  }
}
