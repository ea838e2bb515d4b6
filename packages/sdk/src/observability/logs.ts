/**
 * Structured console logging for registry, ingestion and codec events
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  /** Record type the event concerns */
  type?: string;
  /** Directive, format or module the event concerns */
  subject?: string;
  message?: string;
  details?: Record<string, unknown>;
}

/**
 * Whether debug output is on: RECORDKIT_DEBUG set to anything but "", "0" or "false"
 */
export function debugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const value = env.RECORDKIT_DEBUG;
  return value !== undefined && value !== "" && value !== "0" && value.toLowerCase() !== "false";
}

/**
 * Render an entry as a single console line
 */
export function formatLogEntry(entry: LogEntry): string {
  const parts = [`[${entry.timestamp}] [${entry.level.toUpperCase()}] [${entry.event}]`];

  if (entry.type || entry.subject) {
    parts.push(`${entry.type ?? ""}/${entry.subject ?? ""}`);
  }

  if (entry.message) {
    parts.push(entry.message);
  }

  if (entry.details) {
    parts.push(JSON.stringify(entry.details));
  }

  return parts.join(" ");
}

export class Logger {
  #enabled = true;
  #debug: boolean | undefined;

  /**
   * Log an event
   */
  log(level: LogLevel, event: string, data?: Partial<Omit<LogEntry, "level" | "event">>): void {
    if (!this.#enabled) return;

    const line = formatLogEntry({
      timestamp: new Date().toISOString(),
      level,
      event,
      ...data,
    });

    // Route to appropriate console method
    switch (level) {
      case "debug":
        if (this.#debug ?? debugEnabled()) {
          console.debug(line);
        }
        break;
      case "info":
        console.log(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(line);
        break;
    }
  }

  debug(event: string, data?: Partial<Omit<LogEntry, "level" | "event">>): void {
    this.log("debug", event, data);
  }

  info(event: string, data?: Partial<Omit<LogEntry, "level" | "event">>): void {
    this.log("info", event, data);
  }

  warn(event: string, data?: Partial<Omit<LogEntry, "level" | "event">>): void {
    this.log("warn", event, data);
  }

  error(event: string, data?: Partial<Omit<LogEntry, "level" | "event">>): void {
    this.log("error", event, data);
  }

  /**
   * Force debug output on or off; undefined defers to RECORDKIT_DEBUG
   */
  setDebug(enabled: boolean | undefined): void {
    this.#debug = enabled;
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
