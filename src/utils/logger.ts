/**
 * pg-fluent - Structured Logger
 *
 * Centralized logging with RFC 5424 severity levels and structured output.
 * Everything goes to stderr so stdout stays free for the host application.
 *
 * Format: [timestamp] [LEVEL] [MODULE] [CODE] message {context}
 * Example: [2025-12-18T01:30:00Z] [ERROR] [EXECUTION] [SQL_EXECUTION_FAILED] Query failed {"operation":"execute"}
 */

/**
 * RFC 5424 syslog severity levels
 * @see https://datatracker.ietf.org/doc/html/rfc5424#section-6.2.1
 */
export type LogLevel =
  | "debug" // 7 - Debug-level messages
  | "info" // 6 - Informational messages
  | "notice" // 5 - Normal but significant condition
  | "warning" // 4 - Warning conditions
  | "error" // 3 - Error conditions
  | "critical" // 2 - Critical conditions
  | "alert" // 1 - Action must be taken immediately
  | "emergency"; // 0 - System is unusable

export const LOG_LEVELS: readonly LogLevel[] = [
  "debug",
  "info",
  "notice",
  "warning",
  "error",
  "critical",
  "alert",
  "emergency",
];

/**
 * Module identifiers for log categorization
 */
export type LogModule =
  | "CONFIG" // Builders and environment
  | "CONNECTION" // Connection acquisition and release
  | "COMMAND" // Command materialization and binding
  | "EXECUTION" // Single-statement verbs
  | "TRANSACTION" // Batch transactional execution
  | "DRIVER"; // Driver adapters

/**
 * Structured log context
 */
export interface LogContext {
  /** Module identifier */
  module?: LogModule;
  /** Module-prefixed error/event code (e.g., SQL_EXECUTION_FAILED) */
  code?: string;
  /** Operation being performed (e.g., execute, executeTransaction) */
  operation?: string;
  /** Error stack trace */
  stack?: string;
  /** Additional context fields */
  [key: string]: unknown;
}

interface LogEntry {
  level: LogLevel;
  module?: LogModule | undefined;
  code?: string | undefined;
  message: string;
  timestamp: string;
  context?: LogContext | undefined;
}

// C0 controls except tab, LF and CR; DEL; C1 controls
// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\x00-\x08\x0B\x0C\x0E-\x1F\x7F-\x9F]/g;

class Logger {
  private minLevel: LogLevel = "info";
  private readonly defaultModule: LogModule = "EXECUTION";

  /**
   * RFC 5424 severity priority (lower number = higher severity)
   */
  private readonly levelPriority: Record<LogLevel, number> = {
    emergency: 0,
    alert: 1,
    critical: 2,
    error: 3,
    warning: 4,
    notice: 5,
    info: 6,
    debug: 7,
  };

  /**
   * Keys whose values are never written out
   */
  private readonly sensitiveKeys: ReadonlySet<string> = new Set([
    "password",
    "secret",
    "token",
    "key",
    "passphrase",
    "cert",
    "credential",
    "credentials",
    "connectionstring",
  ]);

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  getLevel(): LogLevel {
    return this.minLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return this.levelPriority[level] <= this.levelPriority[this.minLevel];
  }

  private isSensitive(key: string): boolean {
    const lowerKey = key.toLowerCase();
    return (
      this.sensitiveKeys.has(lowerKey) ||
      [...this.sensitiveKeys].some((sk) => lowerKey.includes(sk))
    );
  }

  private sanitizeContext(context: Record<string, unknown>): LogContext {
    const sanitized: LogContext = {};

    for (const [key, value] of Object.entries(context)) {
      if (this.isSensitive(key) && value !== undefined && value !== null) {
        sanitized[key] = "[REDACTED]";
      } else if (
        typeof value === "object" &&
        value !== null &&
        !Array.isArray(value) &&
        !(value instanceof Date)
      ) {
        sanitized[key] = this.sanitizeContext({ ...value });
      } else {
        sanitized[key] = value;
      }
    }

    return sanitized;
  }

  private sanitizeMessage(message: string): string {
    return message.replace(CONTROL_CHARS, "");
  }

  private formatEntry(entry: LogEntry): string {
    const parts: string[] = [
      `[${entry.timestamp}]`,
      `[${entry.level.toUpperCase()}]`,
    ];

    if (entry.module) {
      parts.push(`[${entry.module}]`);
    }
    if (entry.code) {
      parts.push(`[${entry.code}]`);
    }

    parts.push(this.sanitizeMessage(entry.message));

    if (entry.context) {
      // module and code are already part of the line
      const { module, code, ...restContext } = entry.context;
      void module;
      void code;
      if (Object.keys(restContext).length > 0) {
        parts.push(JSON.stringify(this.sanitizeContext(restContext)));
      }
    }

    return parts.join(" ");
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      level,
      module: context?.module ?? this.defaultModule,
      code: context?.code,
      message,
      timestamp: new Date().toISOString(),
      context,
    };

    console.error(this.formatEntry(entry));
  }

  // =========================================================================
  // Convenience methods for the levels the library writes
  // =========================================================================

  debug(message: string, context?: LogContext): void {
    this.log("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log("warning", message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log("error", message, context);
  }

  /**
   * Create a child logger scoped to a specific module
   */
  forModule(module: LogModule): ModuleLogger {
    return new ModuleLogger(this, module);
  }
}

/**
 * Module-scoped logger
 */
export class ModuleLogger {
  constructor(
    private parent: Logger,
    private module: LogModule,
  ) {}

  private withModule(context?: LogContext): LogContext {
    return { ...context, module: this.module };
  }

  debug(message: string, context?: LogContext): void {
    this.parent.debug(message, this.withModule(context));
  }

  info(message: string, context?: LogContext): void {
    this.parent.info(message, this.withModule(context));
  }

  warn(message: string, context?: LogContext): void {
    this.parent.warn(message, this.withModule(context));
  }

  error(message: string, context?: LogContext): void {
    this.parent.error(message, this.withModule(context));
  }
}

export const logger = new Logger();

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Apply LOG_LEVEL from the environment. Unknown values are ignored.
 */
export function configureLoggerFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): LogLevel {
  const level = env["LOG_LEVEL"]?.trim().toLowerCase();
  if (level !== undefined && isLogLevel(level)) {
    logger.setLevel(level);
  } else if (level !== undefined && level !== "") {
    logger.warn("Ignoring unknown LOG_LEVEL", {
      module: "CONFIG",
      value: level,
    });
  }
  return logger.getLevel();
}
