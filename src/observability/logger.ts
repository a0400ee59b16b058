export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = [
  "debug",
  "info",
  "warn",
  "error",
  "silent",
];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  child(prefix: string): Logger;
}

const isLogLevel = (value: unknown): value is LogLevel =>
  typeof value === "string" && (LOG_LEVELS as readonly string[]).includes(value);

class ConsoleLogger implements Logger {
  constructor(
    private readonly prefix: string,
    private readonly level: LogLevel,
  ) {}

  private shouldLog(level: LogLevel): boolean {
    return (
      this.level !== "silent" &&
      LOG_LEVELS.indexOf(this.level) <= LOG_LEVELS.indexOf(level)
    );
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog("debug")) {
      console.error(`${this.prefix}${message}`, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog("info")) {
      console.error(`${this.prefix}${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog("warn")) {
      console.error(`${this.prefix}warn: ${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog("error")) {
      console.error(`${this.prefix}error: ${message}`, ...args);
    }
  }

  child(prefix: string): Logger {
    return new ConsoleLogger(`${this.prefix}${prefix}`, this.level);
  }
}

// Log lines go to stderr; stdout is reserved for command output.
export const logLevelFromEnv = (
  env: NodeJS.ProcessEnv = process.env,
): LogLevel | undefined => {
  const fromEnv = env.PODFLOW_LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : undefined;
};

export const createLogger = (prefix = "", level?: LogLevel): Logger => {
  const underTest =
    process.env.NODE_ENV === "test" || process.env.VITEST !== undefined;
  const resolved =
    level ?? logLevelFromEnv() ?? (underTest ? "silent" : "info");
  return new ConsoleLogger(prefix, resolved);
};

export const silentLogger: Logger = createLogger("", "silent");
