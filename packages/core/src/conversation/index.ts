export { formatLogRecord, formatTimestamp } from "./format";
export { ConversationLog } from "./log";
export type { ConversationLogOptions } from "./log";
export type { Clock, LineWriter, LogRecord } from "./types";
