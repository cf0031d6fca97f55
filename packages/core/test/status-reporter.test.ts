import { afterEach, describe, expect, it, vi } from "vitest";
import { consoleReporter, createCollectingReporter, describeError } from "../src/status/reporter";

describe("consoleReporter", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("routes each level to its console method", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    consoleReporter.info("loaded");
    consoleReporter.warn("missing");
    consoleReporter.error("broken");

    expect(log).toHaveBeenCalledWith("loaded");
    expect(warn).toHaveBeenCalledWith("missing");
    expect(error).toHaveBeenCalledWith("broken");
  });
});

describe("createCollectingReporter", () => {
  it("records notices in order", () => {
    const reporter = createCollectingReporter();
    reporter.warn("first");
    reporter.info("second");
    expect(reporter.notices).toEqual([
      { level: "warn", message: "first" },
      { level: "info", message: "second" },
    ]);
  });
});

describe("describeError", () => {
  it("uses the message of an Error", () => {
    expect(describeError(new Error("disk full"))).toBe("disk full");
  });

  it("stringifies anything else", () => {
    expect(describeError("plain")).toBe("plain");
    expect(describeError(42)).toBe("42");
  });
});
