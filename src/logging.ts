import { config, type LogLevel } from "./config.js";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  code?: string;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  [key: string]: unknown;
}

export interface LoggerConfig {
  minLevel: LogLevel;
  enableConsole: boolean;
  includeStack: boolean;
}

const SENSITIVE_KEYS = ["password", "token", "secret", "authorization", "apikey", "api_key", "userinfo"];

/**
 * Structured logger that writes one JSON object per line to the console
 */
export class Logger {
  private config: LoggerConfig;
  private levelPriority: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };

  constructor(overrides: Partial<LoggerConfig> = {}) {
    this.config = {
      minLevel: config.logLevel,
      enableConsole: config.logConsole,
      includeStack: config.nodeEnv !== "production",
      ...overrides,
    };
  }

  private shouldLog(level: LogLevel): boolean {
    return this.levelPriority[level] >= this.levelPriority[this.config.minLevel];
  }

  private formatLog(entry: LogEntry): string {
    const sanitized: Record<string, unknown> = { ...entry };

    // Redact sensitive fields
    for (const key of Object.keys(sanitized)) {
      if (SENSITIVE_KEYS.some((sk) => key.toLowerCase().includes(sk))) {
        sanitized[key] = "[REDACTED]";
      }
    }

    return JSON.stringify(sanitized);
  }

  private log(level: LogLevel, message: string, meta: Partial<LogEntry> = {}) {
    if (!this.shouldLog(level)) return;
    if (!this.config.enableConsole) return;

    const entry: LogEntry = {
      ...meta,
      timestamp: new Date().toISOString(),
      level,
      message,
    };

    const output = this.formatLog(entry);

    if (level === "error") {
      console.error(output);
    } else if (level === "warn") {
      console.warn(output);
    } else {
      console.log(output);
    }
  }

  debug(message: string, meta?: Partial<LogEntry>) {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Partial<LogEntry>) {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Partial<LogEntry>) {
    this.log("warn", message, meta);
  }

  error(message: string, error?: Error, meta?: Partial<LogEntry>) {
    this.log("error", message, {
      ...meta,
      error: error
        ? {
            name: error.name,
            message: error.message,
            stack: this.config.includeStack ? error.stack : undefined,
          }
        : undefined,
    });
  }
}

// Export singleton logger
export const logger = new Logger();
