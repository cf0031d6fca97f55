export { consoleReporter, createCollectingReporter, describeError } from "./reporter";
export type { StatusLevel, StatusNotice, StatusReporter } from "./types";
