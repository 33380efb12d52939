export const logLevels = ["silent", "error", "warn", "info", "debug"] as const;
export type LogLevel = (typeof logLevels)[number];

export interface Logger {
  error(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  debug(message: string, ...details: unknown[]): void;
}

type Sink = Pick<Console, "error" | "warn" | "info" | "debug">;

export interface LoggerOptions {
  level: LogLevel;
  prefix: string;
  sink?: Sink;
}

export function createLogger({ level, prefix, sink = console }: LoggerOptions): Logger {
  const threshold = logLevels.indexOf(level);
  const emit =
    (messageLevel: Exclude<LogLevel, "silent">) =>
    (message: string, ...details: unknown[]) => {
      if (logLevels.indexOf(messageLevel) <= threshold) {
        sink[messageLevel](`[${prefix}] ${message}`, ...details);
      }
    };
  return {
    error: emit("error"),
    warn: emit("warn"),
    info: emit("info"),
    debug: emit("debug"),
  };
}

export const silentLogger: Logger = createLogger({ level: "silent", prefix: "" });
