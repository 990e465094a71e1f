export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

const logLevelRank: Readonly<Record<Exclude<LogLevel, "silent">, number>> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export type Logger = {
  error: (message: string) => void;
  warn: (message: string) => void;
  info: (message: string) => void;
  debug: (message: string) => void;
};

export type LogStream = {
  write: (chunk: string) => unknown;
};

const noop = (): void => {};

export const createSilentLogger = (): Logger => ({
  error: noop,
  warn: noop,
  info: noop,
  debug: noop,
});

const shouldLog = (configuredLevel: LogLevel, messageLevel: Exclude<LogLevel, "silent">): boolean => {
  if (configuredLevel === "silent") {
    return false;
  }

  return logLevelRank[messageLevel] <= logLevelRank[configuredLevel];
};

// One line per message; callers pass single-line text.
export const createStreamLogger = (level: LogLevel, stream: LogStream): Logger => {
  if (level === "silent") {
    return createSilentLogger();
  }

  const write = (messageLevel: Exclude<LogLevel, "silent">, message: string): void => {
    if (shouldLog(level, messageLevel)) {
      stream.write(`[git-red] ${messageLevel.toUpperCase()} ${message}\n`);
    }
  };

  return {
    error: (message) => write("error", message),
    warn: (message) => write("warn", message),
    info: (message) => write("info", message),
    debug: (message) => write("debug", message),
  };
};

export const parseLogLevel = (value: string | undefined): LogLevel => {
  switch (value) {
    case "silent":
    case "error":
    case "warn":
    case "info":
    case "debug":
      return value;
    default:
      return "warn";
  }
};
