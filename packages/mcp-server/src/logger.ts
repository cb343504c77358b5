// Structured stderr logger; stdout belongs to the stdio transport

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export function createLogger(
  level: LogLevel,
  scope = "bond-risk-mcp",
  write: (line: string) => void = (line) => console.error(line),
): Logger {
  const emit = (at: Exclude<LogLevel, "silent">, message: string, data?: Record<string, unknown>) => {
    if (RANK[at] < RANK[level]) return;
    const prefix = `[${scope}:${at.toUpperCase()}]`;
    write(data ? `${prefix} ${message} ${JSON.stringify(data)}` : `${prefix} ${message}`);
  };
  return {
    debug: (message, data) => emit("debug", message, data),
    info: (message, data) => emit("info", message, data),
    warn: (message, data) => emit("warn", message, data),
    error: (message, data) => emit("error", message, data),
  };
}
