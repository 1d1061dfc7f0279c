export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
}

export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  verbose?: boolean;
  sink?: LogSink;
}

// stdout carries command output, so every level goes to stderr
const consoleSink: LogSink = (_level, line) => {
  // eslint-disable-next-line no-console
  console.error(line);
};

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? consoleSink;
  const verbose = options.verbose ?? false;

  const emit = (level: LogLevel, message: string) => {
    if (level === "debug" && !verbose) {
      return;
    }
    sink(level, `[${scope}] ${message}`);
  };

  return {
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
    child: (childScope) => createLogger(`${scope}:${childScope}`, options)
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger
};
