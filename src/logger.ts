import pino from "pino";
import type { Logger } from "pino";
import type { LogLevel, LogSink } from "./types/log.js";

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function envLevel(): LogLevel | undefined {
  return LEVELS.find((l) => l === process.env.LOG_LEVEL);
}

export interface LoggerOptions {
  /** Log file the stdout stream is mirrored into; created with its directory if missing. */
  logFile?: string;
  level?: LogLevel;
}

/**
 * Line-oriented logger: one JSON record per line with an ISO timestamp and an
 * upper-case level label, written to stdout and appended to the log file.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? envLevel() ?? "info";
  const streams: pino.StreamEntry[] = [{ level, stream: process.stdout }];
  if (options.logFile) {
    streams.push({ level, stream: pino.destination({ dest: options.logFile, mkdir: true, sync: true }) });
  }

  return pino(
    {
      name: "provision-kit",
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label) => ({ level: label.toUpperCase() }),
      },
    },
    pino.multistream(streams),
  );
}

/** Adapt a pino logger to the sink interface the provisioning core records into. */
export function pinoSink(logger: Logger): LogSink {
  return {
    record(level, message, context) {
      if (context) logger[level](context, message);
      else logger[level](message);
    },
  };
}
