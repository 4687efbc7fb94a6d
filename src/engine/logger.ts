/**
 * Structured logging for table loading and shaping.
 * Entries below the threshold (FONT_LAYOUT_LOG_LEVEL, default "warn") are
 * neither kept nor printed. Only the most recent MAX_LOG_ENTRIES are kept.
 */

import type { LogEntry, LogLevel } from "../types/layout.types";

export const MAX_LOG_ENTRIES = 1000;

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function levelFromEnv(): LogLevel {
  const raw = process.env.FONT_LAYOUT_LOG_LEVEL?.toLowerCase();
  return raw === "debug" || raw === "info" || raw === "warn" || raw === "error" ? raw : "warn";
}

/**
 * Logger instance for the layout engine
 */
class LayoutLogger {
  private entries: LogEntry[] = [];
  private threshold: LogLevel = levelFromEnv();

  info(component: string, action: string, metadata?: Record<string, unknown>): void {
    this.log("info", component, action, metadata);
  }

  warn(component: string, action: string, metadata?: Record<string, unknown>): void {
    this.log("warn", component, action, metadata);
  }

  error(component: string, action: string, metadata?: Record<string, unknown>): void {
    this.log("error", component, action, metadata);
  }

  debug(component: string, action: string, metadata?: Record<string, unknown>): void {
    this.log("debug", component, action, metadata);
  }

  /**
   * Log with duration since `startTime`
   */
  timed(
    level: LogLevel,
    component: string,
    action: string,
    startTime: number,
    metadata?: Record<string, unknown>
  ): void {
    const duration = Date.now() - startTime;
    this.log(level, component, action, { ...metadata, duration });
  }

  setLevel(level: LogLevel): void {
    this.threshold = level;
  }

  getLevel(): LogLevel {
    return this.threshold;
  }

  private log(
    level: LogLevel,
    component: string,
    action: string,
    metadata?: Record<string, unknown>
  ): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.threshold]) return;

    const entry: LogEntry = {
      ...metadata,
      timestamp: Date.now(),
      level,
      component,
      action,
    };
    this.entries.push(entry);
    if (this.entries.length > MAX_LOG_ENTRIES) this.entries.shift();

    const message = `[${component}] ${action}`;
    const logData = metadata ? { ...metadata } : {};

    switch (level) {
      case "info":
        console.log(message, logData);
        break;
      case "warn":
        console.warn(message, logData);
        break;
      case "error":
        console.error(message, logData);
        break;
      case "debug":
        console.debug(message, logData);
        break;
    }
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  clear(): void {
    this.entries = [];
  }
}

// Export singleton instance
export const layoutLogger = new LayoutLogger();
