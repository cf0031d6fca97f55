export type StatusLevel = "info" | "warn" | "error";

export interface StatusNotice {
  level: StatusLevel;
  message: string;
}

/** Receives every human-readable notice the store and log emit. */
export interface StatusReporter {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}
