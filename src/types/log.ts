export type LogLevel = "debug" | "info" | "warn" | "error";

/** The only logging capability the core depends on. */
export interface LogSink {
  record(level: LogLevel, message: string, context?: Record<string, unknown>): void;
}
