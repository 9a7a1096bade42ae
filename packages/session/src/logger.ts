export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = {
  debug: (message: string, meta?: unknown) => void;
  info: (message: string, meta?: unknown) => void;
  warn: (message: string, meta?: unknown) => void;
  error: (message: string, meta?: unknown) => void;
  child: (tag: string) => Logger;
};

const LEVEL_WEIGHT: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function parseLogLevel(raw: string | undefined): LogLevel {
  const value = raw?.trim().toLowerCase();
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  return "info";
}

// Console logger that prefixes each line with its component tag, e.g. "[Session 1a2b3c4d]".
export function createLogger(
  tag: string,
  level: LogLevel = parseLogLevel(process.env.LOG_LEVEL),
): Logger {
  const write = (lineLevel: LogLevel, message: string, meta?: unknown) => {
    if (LEVEL_WEIGHT[lineLevel] < LEVEL_WEIGHT[level]) {
      return;
    }

    const line = `[${tag}] ${message}`;
    const sink =
      lineLevel === "error" ? console.error : lineLevel === "warn" ? console.warn : console.log;
    if (meta === undefined) sink(line);
    else sink(line, meta);
  };

  return {
    debug: (message, meta) => write("debug", message, meta),
    info: (message, meta) => write("info", message, meta),
    warn: (message, meta) => write("warn", message, meta),
    error: (message, meta) => write("error", message, meta),
    child: (childTag) => createLogger(`${tag}:${childTag}`, level),
  };
}
