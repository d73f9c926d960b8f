/**
 * Logging utilities with structured output and log levels
 *
 * All output goes to stderr: stdout carries the run summary and the MCP stdio stream.
 */

import { getConfig } from "../../config.js";
import type { LogLevel } from "../../types.js";

interface LogContext {
  [key: string]: unknown;
}

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

class Logger {
  private level: LogLevel | null = null;

  /**
   * Get the current log level: an explicit override, else the loaded config, else info
   */
  private getLevel(): LogLevel {
    if (this.level !== null) {
      return this.level;
    }
    try {
      return getConfig().logLevel;
    } catch {
      // Config not loaded yet
      return "info";
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.getLevel());
  }

  private formatMessage(level: LogLevel, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const contextStr = context ? ` ${JSON.stringify(context)}` : "";
    return `[${timestamp}] [${level.toUpperCase()}] ${message}${contextStr}`;
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (this.shouldLog(level)) {
      console.error(this.formatMessage(level, message, context));
    }
  }

  debug(message: string, context?: LogContext): void {
    this.write("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write("warn", message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write("error", message, context);
  }

  /**
   * Log tool invocation
   */
  logToolInvocation(toolName: string, args: unknown, context?: LogContext): void {
    this.debug(`Tool invoked: ${toolName}`, {
      tool: toolName,
      args,
      ...context,
    });
  }

  /**
   * Log an input line that was skipped as malformed
   */
  logSkippedLine(lineNumber: number, reason: string, context?: LogContext): void {
    this.debug(`Skipped line ${lineNumber}: ${reason}`, {
      line: lineNumber,
      reason,
      ...context,
    });
  }

  /**
   * Log the chunking result for one record
   */
  logChunking(breadcrumb: string, chunkCount: number, context?: LogContext): void {
    this.debug(`Chunked record into ${chunkCount} chunk(s)`, {
      breadcrumb,
      chunk_count: chunkCount,
      ...context,
    });
  }

  /**
   * Override the config-based level until resetLevel() is called
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Drop the override and follow the config again
   */
  resetLevel(): void {
    this.level = null;
  }

  getCurrentLevel(): LogLevel {
    return this.getLevel();
  }
}

/**
 * Singleton logger instance
 */
export const logger = new Logger();
