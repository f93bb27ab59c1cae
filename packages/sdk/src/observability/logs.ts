/**
 * Structured logging for document lifecycle operations
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  type?: string;
  collection?: string;
  field?: string;
  message?: string;
  details?: Record<string, unknown>;
}

/**
 * Read the minimum level from DOCMAP_LOG_LEVEL (default: "warn")
 */
export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const value = env.DOCMAP_LOG_LEVEL?.toLowerCase();
  return LOG_LEVELS.find((level) => level === value) ?? "warn";
}

export class Logger {
  #enabled = true;
  readonly #minLevel: LogLevel;

  constructor(minLevel: LogLevel = levelFromEnv()) {
    this.#minLevel = minLevel;
  }

  #shouldLog(level: LogLevel): boolean {
    return this.#enabled && LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.#minLevel);
  }

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Partial<LogEntry>): void {
    if (!this.#shouldLog(level)) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    };

    // Format for console output
    const prefix = `[${entry.timestamp}] [${level.toUpperCase()}] [${event}]`;
    const parts = [prefix];

    if (entry.type || entry.collection) {
      parts.push(`${entry.type ?? ""}@${entry.collection ?? ""}`);
    }

    if (entry.field) {
      parts.push(`field=${entry.field}`);
    }

    if (entry.message) {
      parts.push(entry.message);
    }

    if (entry.details) {
      parts.push(JSON.stringify(entry.details));
    }

    // Route to appropriate console method
    switch (level) {
      case "debug":
        console.debug(parts.join(" "));
        break;
      case "info":
        console.log(parts.join(" "));
        break;
      case "warn":
        console.warn(parts.join(" "));
        break;
      case "error":
        console.error(parts.join(" "));
        break;
    }
  }

  debug(event: string, data?: Partial<LogEntry>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Partial<LogEntry>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Partial<LogEntry>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Partial<LogEntry>): void {
    this.log("error", event, data);
  }

  get level(): LogLevel {
    return this.#minLevel;
  }

  /**
   * Enable/disable logging
   */
  setEnabled(enabled: boolean): void {
    this.#enabled = enabled;
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
