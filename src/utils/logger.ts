/**
 * Levelled console logger shared by every component.
 * Components log through a scoped child so lines read `[time] [LEVEL] [scope] message`.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

export function parseLogLevel(value: string): LogLevel | undefined {
  return LEVEL_NAMES[value.trim().toLowerCase()];
}

class Logger {
  private level: LogLevel = LogLevel.INFO;

  constructor(private readonly scope?: string, private readonly parent?: Logger) {}

  setLevel(level: LogLevel) {
    if (this.parent) {
      this.parent.setLevel(level);
      return;
    }
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.parent ? this.parent.getLevel() : this.level;
  }

  /**
   * Child logger writing under `[scope]`; the level stays shared with the root.
   */
  child(scope: string): Logger {
    return new Logger(this.scope ? `${this.scope}:${scope}` : scope, this.parent ?? this);
  }

  private prefix(levelName: string): string {
    const timestamp = new Date().toISOString();
    const scope = this.scope ? ` [${this.scope}]` : '';
    return `[${timestamp}] [${levelName}]${scope}`;
  }

  private log(level: LogLevel, message: string, ...args: unknown[]) {
    if (level < this.getLevel()) {
      return;
    }

    const prefix = this.prefix(LogLevel[level] ?? 'INFO');

    switch (level) {
      case LogLevel.ERROR:
        console.error(prefix, message, ...args);
        break;
      case LogLevel.WARN:
        console.warn(prefix, message, ...args);
        break;
      case LogLevel.DEBUG:
        console.debug(prefix, message, ...args);
        break;
      default:
        console.log(prefix, message, ...args);
    }
  }

  debug(message: string, ...args: unknown[]) {
    this.log(LogLevel.DEBUG, message, ...args);
  }

  info(message: string, ...args: unknown[]) {
    this.log(LogLevel.INFO, message, ...args);
  }

  warn(message: string, ...args: unknown[]) {
    this.log(LogLevel.WARN, message, ...args);
  }

  error(message: string, ...args: unknown[]) {
    this.log(LogLevel.ERROR, message, ...args);
  }

  success(message: string, ...args: unknown[]) {
    if (LogLevel.INFO < this.getLevel()) {
      return;
    }
    console.log(`${this.prefix('SUCCESS')} ✓`, message, ...args);
  }
}

export type { Logger };

export const logger = new Logger();
