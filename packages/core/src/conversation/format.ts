import type { LogRecord } from "./types";

const pad = (n: number) => String(n).padStart(2, "0");

/** Local wall-clock time as `YYYY-MM-DD HH:MM:SS` */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function formatLogRecord(record: LogRecord): string {
  return `[${formatTimestamp(record.timestamp)}] User: ${record.input} | Bot: ${record.output}`;
}
