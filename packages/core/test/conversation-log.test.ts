import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { formatLogRecord, formatTimestamp } from "../src/conversation/format";
import { ConversationLog } from "../src/conversation/log";
import { createCollectingReporter } from "../src/status/reporter";

/** Clock that starts at 2024-01-15 09:05:07.450 local time and ticks one second per call. */
function tickingClock() {
  let seconds = 7;
  return () => new Date(2024, 0, 15, 9, 5, seconds++, 450);
}

describe("formatTimestamp", () => {
  it("formats local time with zero padding", () => {
    expect(formatTimestamp(new Date(2024, 0, 5, 3, 4, 9))).toBe("2024-01-05 03:04:09");
    expect(formatTimestamp(new Date(2023, 11, 31, 23, 59, 59))).toBe("2023-12-31 23:59:59");
  });
});

describe("formatLogRecord", () => {
  it("uses the fixed record layout", () => {
    const record = { timestamp: new Date(2024, 0, 15, 9, 5, 7), input: "hello", output: "hi there" };
    expect(formatLogRecord(record)).toBe("[2024-01-15 09:05:07] User: hello | Bot: hi there");
  });
});

describe("ConversationLog", () => {
  let tmpDir: string;
  let reporter: ReturnType<typeof createCollectingReporter>;
  let lines: string[];

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "keybot-log-"));
    reporter = createCollectingReporter();
    lines = [];
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  function makeLog(): ConversationLog {
    return new ConversationLog({ reporter, clock: tickingClock(), write: (line) => lines.push(line) });
  }

  it("keeps records in append order", () => {
    const log = makeLog();
    log.append("a", "1");
    log.append("b", "2");
    log.append("c", "3");

    const records = log.records();
    expect(records).toHaveLength(3);
    expect(log.size).toBe(3);
    expect(records.map((r) => r.input)).toEqual(["a", "b", "c"]);
    expect(records.map((r) => r.output)).toEqual(["1", "2", "3"]);
  });

  it("stamps records at second resolution", () => {
    const log = makeLog();
    const record = log.append("hello", "hi");
    expect(record.timestamp.getMilliseconds()).toBe(0);
    expect(record.timestamp.getSeconds()).toBe(7);
  });

  it("does not mutate the date returned by the clock", () => {
    const fixed = new Date(2024, 0, 15, 9, 5, 7, 450);
    const log = new ConversationLog({ reporter, clock: () => fixed });
    log.append("a", "b");
    expect(fixed.getMilliseconds()).toBe(450);
  });

  it("freezes records", () => {
    const log = makeLog();
    const record = log.append("hello", "hi");
    expect(Object.isFrozen(record)).toBe(true);
  });

  it("records() returns a copy", () => {
    const log = makeLog();
    log.append("a", "1");
    const snapshot = log.records();
    snapshot.pop();
    expect(log.records()).toHaveLength(1);
  });

  it("display reports an empty log", () => {
    const log = makeLog();
    log.display();
    expect(lines).toEqual(["No logs available."]);
  });

  it("display prints every record in order", () => {
    const log = makeLog();
    log.append("hello", "hi there");
    log.append("bye", "Sorry, I don't understand that.");
    log.display();
    expect(lines).toEqual([
      "Conversation Logs:",
      "[2024-01-15 09:05:07] User: hello | Bot: hi there",
      "[2024-01-15 09:05:08] User: bye | Bot: Sorry, I don't understand that.",
    ]);
    expect(log.size).toBe(2);
  });

  it("saves one line per record", async () => {
    const path = join(tmpDir, "chat.log");
    const log = makeLog();
    log.append("hello", "hi there");
    log.append("how are you?", "fine");

    expect(log.save(path)).toEqual({ status: "saved", path, count: 2 });
    expect(await readFile(path, "utf-8")).toBe(
      "[2024-01-15 09:05:07] User: hello | Bot: hi there\n[2024-01-15 09:05:08] User: how are you? | Bot: fine\n",
    );
    expect(reporter.notices).toEqual([{ level: "info", message: `Logs saved to ${path}.` }]);
  });

  it("saves an empty file for an empty log", async () => {
    const path = join(tmpDir, "empty.log");
    makeLog().save(path);
    expect(await readFile(path, "utf-8")).toBe("");
  });

  it("reports a failed save and keeps records", () => {
    const path = join(tmpDir, "missing", "chat.log");
    const log = makeLog();
    log.append("hello", "hi");

    const result = log.save(path);

    expect(result.status).toBe("failed");
    expect(log.records()).toHaveLength(1);
    expect(reporter.notices[0].level).toBe("error");
    expect(reporter.notices[0].message.startsWith(`Error saving logs to '${path}': `)).toBe(true);
  });
});
