export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const PREFIX = "frametrack";

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Leveled console logger. Everything goes to stderr so command output on
 * stdout stays clean.
 */
export class Logger {
  // Shared with children so setLevel on the root reaches every scope.
  private readonly state: { level: LogLevel };

  constructor(
    private readonly scope?: string,
    level: LogLevel | { level: LogLevel } = "warn"
  ) {
    this.state = typeof level === "string" ? { level } : level;
  }

  setLevel(level: LogLevel): void {
    this.state.level = level;
  }

  getLevel(): LogLevel {
    return this.state.level;
  }

  child(scope: string): Logger {
    return new Logger(scope, this.state);
  }

  debug(message: string, data?: unknown): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: unknown): void {
    this.log("error", message, data);
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.state.level]) {
      return;
    }
    const tag = this.scope ? `${PREFIX}:${this.scope}` : PREFIX;
    const line = `${tag}: [${level}] ${message}`;
    if (data === undefined) {
      console.error(line);
    } else {
      console.error(line, data);
    }
  }
}

export const logger = new Logger();
