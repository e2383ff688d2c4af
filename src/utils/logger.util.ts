import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string, err?: Error) => void;
  debug: (msg: string) => void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * Parse a LOG_LEVEL value. DEBUG=1 forces debug output.
 */
export function parseLogLevel(
  raw: string | undefined,
  debugFlag?: string,
): LogLevel {
  if (debugFlag === "1") return "debug";
  const value = (raw ?? "").toLowerCase();
  if (value === "trace") return "debug";
  return LOG_LEVELS.find((level) => level === value) ?? "info";
}

export class ConsoleLogger implements Logger {
  private readonly minPriority: number;

  constructor(level: LogLevel = "info") {
    this.minPriority = LOG_LEVEL_PRIORITY[level];
  }

  info(msg: string): void {
    if (!this.shouldLog("info")) return;
    console.log(chalk.cyan("[INFO]"), msg);
  }

  warn(msg: string): void {
    if (!this.shouldLog("warn")) return;
    console.warn(chalk.yellow("[WARN]"), msg);
  }

  error(msg: string, err?: Error): void {
    if (!this.shouldLog("error")) return;
    console.error(
      chalk.red("[ERROR]"),
      msg,
      err ? `\n${err.stack ?? err.message}` : "",
    );
  }

  debug(msg: string): void {
    if (!this.shouldLog("debug")) return;
    console.debug(chalk.gray("[DEBUG]"), msg);
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= this.minPriority;
  }
}

/**
 * Create a no-op logger that discards all output
 */
export function createNullLogger(): Logger {
  return {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
  };
}
