import type { StatusReporter } from "@keybot/core";
import { paint, t } from "./theme";

export interface TerminalReporterOptions {
  /** Drop info notices (one-shot mode keeps stdout for the answer) */
  quiet?: boolean;
  color?: boolean;
}

/** Status channel for the terminal: info to stdout, warn and error to stderr. */
export function createTerminalReporter(options: TerminalReporterOptions = {}): StatusReporter {
  const color = options.color ?? process.stderr.isTTY === true;
  return {
    info: (message) => {
      if (!options.quiet) console.log(paint(t.success, message, color));
    },
    warn: (message) => console.warn(paint(t.warn, message, color)),
    error: (message) => console.error(paint(t.error, message, color)),
  };
}
