export { LogLevel, logger, parseLogLevel, toFields, toMessage } from "./logger";
export type { LogRecord, LogSink } from "./logger";

export { FileLogSink, formatLogLine } from "./file-log-sink";
export type { FileLogSinkOptions } from "./file-log-sink";

export { Style, padLeft, padRight, visibleLength } from "./style";
export type { StyleToken } from "./style";

export { renderTable } from "./text-table";
export type { ColumnAlign, TableColumn } from "./text-table";
