import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

export type { Logger } from "pino";

export interface CreateLoggerOptions {
  level?: string;
  destination?: DestinationStream;
}

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const loggerOptions: LoggerOptions = {
    level: options.level ?? "warn",
    base: {
      service: "table-core"
    }
  };

  return options.destination ? pino(loggerOptions, options.destination) : pino(loggerOptions);
}
