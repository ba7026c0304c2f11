export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Writes to stderr only: stdout belongs to command output (YAML, JSON).
 */
class StderrLogger implements Logger {
  constructor(
    private readonly prefix: string,
    private readonly level: LogLevel,
  ) { }

  private write(level: Exclude<LogLevel, "silent">, message: string, args: unknown[]): void {
    if (this.level === "silent" || LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.level)) {
      return;
    }
    const tag = level === "warn" || level === "error" ? `${level.toUpperCase()} ` : "";
    console.error(`${this.prefix}${tag}${message}`, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.write("debug", message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write("info", message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write("warn", message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write("error", message, args);
  }
}

/**
 * Creates a stderr logger.
 * Level resolution: explicit `level`, then LOG_LEVEL, then "silent" under
 * NODE_ENV=test, then `fallback`.
 */
export function createLogger(prefix: string = "", level?: LogLevel, fallback: LogLevel = "info"): Logger {
  const envLevel = process.env['LOG_LEVEL'];
  const logLevel = level ??
    (isLogLevel(envLevel) ? envLevel : undefined) ??
    (process.env['NODE_ENV'] === "test" ? "silent" : fallback);

  return new StderrLogger(prefix, logLevel);
}
