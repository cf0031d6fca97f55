import type { StatusNotice, StatusReporter } from "./types";

export const consoleReporter: StatusReporter = {
  info: (message) => console.log(message),
  warn: (message) => console.warn(message),
  error: (message) => console.error(message),
};

/** Reporter that keeps notices in memory instead of printing them. */
export function createCollectingReporter(): StatusReporter & { notices: StatusNotice[] } {
  const notices: StatusNotice[] = [];
  return {
    notices,
    info: (message) => notices.push({ level: "info", message }),
    warn: (message) => notices.push({ level: "warn", message }),
    error: (message) => notices.push({ level: "error", message }),
  };
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
