/**
 * Drift Logging
 *
 * Structured logger with levels, subsystems, per-run context and pluggable
 * transports. Console output goes to stderr so that reports written to
 * stdout stay machine-readable.
 */

import type { LogLevel } from "../config/schema.js";

export type { LogLevel };

export type LogEntry = {
  timestamp: Date;
  level: LogLevel;
  subsystem: string;
  message: string;
  metadata?: Record<string, unknown>;
  runId?: string;
  target?: string;
  address?: string;
};

export type LogFormatter = (entry: LogEntry) => string;

export interface LogTransport {
  name: string;
  write(entry: LogEntry): void;
}

export type LogContext = {
  runId?: string;
  target?: string;
  address?: string;
  [key: string]: unknown;
};

export interface DriftLogger {
  readonly subsystem: string;

  trace(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  fatal(message: string, meta?: Record<string, unknown>): void;

  child(name: string): DriftLogger;
  withContext(context: LogContext): DriftLogger;
  setLevel(level: LogLevel): void;
  getLevel(): LogLevel;
  isLevelEnabled(level: LogLevel): boolean;
}

// =============================================================================
// Levels
// =============================================================================

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
};

export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

// =============================================================================
// Formatter
// =============================================================================

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  magenta: "\x1b[35m",
  blue: "\x1b[34m",
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: COLORS.dim,
  debug: COLORS.cyan,
  info: COLORS.green,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.magenta,
};

export function createDefaultFormatter(options?: { colors?: boolean; timestamps?: boolean }): LogFormatter {
  const { colors = process.stderr.isTTY ?? false, timestamps = true } = options ?? {};
  const paint = (color: string, text: string): string => (colors ? `${color}${text}${COLORS.reset}` : text);

  return (entry) => {
    const parts: string[] = [];
    if (timestamps) parts.push(paint(COLORS.dim, entry.timestamp.toISOString()));
    parts.push(paint(LEVEL_COLORS[entry.level], entry.level.toUpperCase().padEnd(5)));
    parts.push(paint(COLORS.blue, `[${entry.subsystem}]`));
    parts.push(entry.message);

    const contextParts: string[] = [];
    if (entry.runId) contextParts.push(`run=${entry.runId}`);
    if (entry.target) contextParts.push(`target=${entry.target}`);
    if (entry.address) contextParts.push(`address=${entry.address}`);
    if (contextParts.length > 0) parts.push(paint(COLORS.dim, `(${contextParts.join(" ")})`));

    if (entry.metadata && Object.keys(entry.metadata).length > 0) {
      parts.push(paint(COLORS.dim, JSON.stringify(entry.metadata)));
    }
    return parts.join(" ");
  };
}

// =============================================================================
// Transports
// =============================================================================

export class ConsoleTransport implements LogTransport {
  name = "console";
  private formatter: LogFormatter;

  constructor(options?: { formatter?: LogFormatter }) {
    this.formatter = options?.formatter ?? createDefaultFormatter();
  }

  write(entry: LogEntry): void {
    process.stderr.write(`${this.formatter(entry)}\n`);
  }
}

/** Keeps entries in memory; used by tests to assert on log output. */
export class MemoryTransport implements LogTransport {
  name = "memory";
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  messages(level?: LogLevel): string[] {
    return this.entries.filter((e) => level === undefined || e.level === level).map((e) => e.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

// =============================================================================
// Logger
// =============================================================================

export class DriftLoggerImpl implements DriftLogger {
  readonly subsystem: string;
  private level: LogLevel;
  private transports: LogTransport[];
  private context: LogContext;
  private redactPatterns: RegExp[];

  constructor(options: {
    subsystem: string;
    level?: LogLevel;
    transports?: LogTransport[];
    context?: LogContext;
    redactPatterns?: string[];
  }) {
    this.subsystem = options.subsystem;
    this.level = options.level ?? "info";
    this.transports = options.transports ?? [new ConsoleTransport()];
    this.context = options.context ?? {};
    this.redactPatterns = (options.redactPatterns ?? []).map((p) => new RegExp(p, "gi"));
  }

  trace(message: string, meta?: Record<string, unknown>): void {
    this.log("trace", message, meta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.log("error", message, meta);
  }

  fatal(message: string, meta?: Record<string, unknown>): void {
    this.log("fatal", message, meta);
  }

  child(name: string): DriftLogger {
    return this.derive(`${this.subsystem}/${name}`, this.context);
  }

  withContext(context: LogContext): DriftLogger {
    return this.derive(this.subsystem, { ...this.context, ...context });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return shouldLog(level, this.level);
  }

  private derive(subsystem: string, context: LogContext): DriftLogger {
    return new DriftLoggerImpl({
      subsystem,
      level: this.level,
      transports: this.transports,
      context,
      redactPatterns: this.redactPatterns.map((r) => r.source),
    });
  }

  private log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (!shouldLog(level, this.level)) return;

    const { runId, target, address, ...rest } = this.context;
    const merged = { ...rest, ...meta };
    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      subsystem: this.subsystem,
      message: this.redact(message),
      ...(Object.keys(merged).length > 0 ? { metadata: this.redactObject(merged) } : {}),
      ...(typeof runId === "string" ? { runId } : {}),
      ...(typeof target === "string" ? { target } : {}),
      ...(typeof address === "string" ? { address } : {}),
    };

    for (const transport of this.transports) {
      try {
        transport.write(entry);
      } catch (err) {
        process.stderr.write(
          `log transport "${transport.name}" failed: ${err instanceof Error ? err.message : String(err)}\n`,
        );
      }
    }
  }

  private redact(value: string): string {
    let result = value;
    for (const pattern of this.redactPatterns) {
      result = result.replace(pattern, "[REDACTED]");
    }
    return result;
  }

  private redactObject(obj: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (typeof value === "string") {
        result[key] = this.redact(value);
      } else if (isRecord(value)) {
        result[key] = this.redactObject(value);
      } else {
        result[key] = value;
      }
    }
    return result;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// =============================================================================
// Factory
// =============================================================================

export function createLogger(
  subsystem: string,
  options?: { level?: LogLevel; transports?: LogTransport[]; redactPatterns?: string[] },
): DriftLogger {
  return new DriftLoggerImpl({
    subsystem: `drift/${subsystem}`,
    level: options?.level ?? "info",
    transports: options?.transports ?? [new ConsoleTransport()],
    redactPatterns: options?.redactPatterns,
  });
}

let globalLogger: DriftLogger | null = null;

export function getLogger(subsystem?: string): DriftLogger {
  if (!globalLogger) {
    globalLogger = createLogger("core", { level: "warn" });
  }
  return subsystem ? globalLogger.child(subsystem) : globalLogger;
}

export function setGlobalLogger(logger: DriftLogger): void {
  globalLogger = logger;
}
