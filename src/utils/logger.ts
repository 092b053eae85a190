import fs from "fs-extra";
import * as path from "path";
import * as os from "os";
import { format } from "date-fns";

export const LOG_LEVELS = ["error", "warn", "info", "debug", "trace"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
  filePath: string;
  level: LogLevel;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Parse a level name case-insensitively; unknown names fall back to "info".
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase() ?? "";
  return isLogLevel(normalized) ? normalized : "info";
}

export function defaultLogFilePath(): string {
  return path.join(os.homedir(), "termsearch.log");
}

/**
 * Append-only file logger. Stays silent until configured, since the
 * terminal itself is owned by the interactive session.
 */
export class Logger {
  private static instance: Logger;
  private options: LoggerOptions | null = null;

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * Reset the singleton instance (for testing purposes only)
   */
  static resetInstance(): void {
    Logger.instance = new Logger();
  }

  configure(options: LoggerOptions): void {
    fs.ensureDirSync(path.dirname(options.filePath));
    this.options = options;
  }

  isEnabled(level: LogLevel): boolean {
    if (!this.options) {
      return false;
    }
    return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(this.options.level);
  }

  error(message: string): void {
    this.write("error", message);
  }

  warn(message: string): void {
    this.write("warn", message);
  }

  info(message: string): void {
    this.write("info", message);
  }

  debug(message: string): void {
    this.write("debug", message);
  }

  trace(message: string): void {
    this.write("trace", message);
  }

  private write(level: LogLevel, message: string): void {
    if (!this.options || !this.isEnabled(level)) {
      return;
    }

    const timestamp = format(new Date(), "yyyy-MM-dd HH:mm:ss");
    const line = `${timestamp} [${level.toUpperCase()}] ${message}\n`;

    try {
      fs.appendFileSync(this.options.filePath, line, "utf-8");
    } catch {
      // Stop logging after the first failed write; stderr belongs to the session
      this.options = null;
    }
  }
}

/**
 * Convenience function to get the singleton instance
 */
export function getLogger(): Logger {
  return Logger.getInstance();
}
