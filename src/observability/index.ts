/**
 * Blob Storage Observability Module
 *
 * Logging and metrics abstractions used by the pipeline policies.
 */

/**
 * Log levels.
 */
export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";

/**
 * Logger interface.
 */
export interface Logger {
  error(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
  trace(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

/**
 * Metrics collector interface.
 */
export interface MetricsCollector {
  incrementCounter(name: string, value?: number, labels?: Record<string, string>): void;
  recordHistogram(name: string, value: number, labels?: Record<string, string>): void;
}

/**
 * Standard metric names for pipeline operations.
 */
export const MetricNames = {
  OPERATIONS_TOTAL: "blob_storage_operations_total",
  OPERATION_LATENCY_MS: "blob_storage_operation_latency_ms",
  TRY_LATENCY_MS: "blob_storage_try_latency_ms",
  RETRY_ATTEMPTS: "blob_storage_retry_attempts_total",
  SECONDARY_DISABLED: "blob_storage_secondary_disabled_total",
} as const;

/**
 * Sensitive fields that should be redacted in logs.
 */
const SENSITIVE_FIELDS = ["accountkey", "token", "authorization", "signature", "sig", "secret", "password"];

function isSensitiveKey(key: string): boolean {
  const lowerKey = key.toLowerCase();
  return SENSITIVE_FIELDS.some((field) => lowerKey === field || (field.length > 3 && lowerKey.includes(field)));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Error);
}

/**
 * Sanitize context by redacting sensitive fields.
 */
export function sanitizeContext(context: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(context)) {
    if (isSensitiveKey(key)) {
      sanitized[key] = "[REDACTED]";
    } else if (isRecord(value)) {
      sanitized[key] = sanitizeContext(value);
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}

/**
 * Replace the SAS signature in a URL so it can be logged.
 */
export function redactUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }
  if (!parsed.searchParams.has("sig")) {
    return url;
  }
  parsed.searchParams.set("sig", "REDACTED");
  return parsed.toString();
}

/**
 * Log level priority (lower = more important).
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

/**
 * Console logger implementation.
 */
export class ConsoleLogger implements Logger {
  private level: LogLevel;
  private context: Record<string, unknown>;

  constructor(level: LogLevel = "info", context: Record<string, unknown> = {}) {
    this.level = level;
    this.context = context;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[this.level];
  }

  private formatMessage(level: LogLevel, message: string, context?: Record<string, unknown>): string {
    const timestamp = new Date().toISOString();
    const merged = sanitizeContext({ ...this.context, ...(context ?? {}) });
    const contextStr = Object.keys(merged).length > 0 ? ` ${JSON.stringify(merged)}` : "";
    return `[${timestamp}] ${level.toUpperCase()} ${message}${contextStr}`;
  }

  error(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog("error")) {
      console.error(this.formatMessage("error", message, context));
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog("warn")) {
      console.warn(this.formatMessage("warn", message, context));
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog("info")) {
      console.info(this.formatMessage("info", message, context));
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog("debug")) {
      console.debug(this.formatMessage("debug", message, context));
    }
  }

  trace(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog("trace")) {
      console.log(this.formatMessage("trace", message, context));
    }
  }

  child(context: Record<string, unknown>): Logger {
    return new ConsoleLogger(this.level, { ...this.context, ...context });
  }
}

/**
 * No-op logger for when logging is disabled.
 */
export class NoopLogger implements Logger {
  error(_message: string, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  debug(_message: string, _context?: Record<string, unknown>): void {}
  trace(_message: string, _context?: Record<string, unknown>): void {}
  child(_context: Record<string, unknown>): Logger {
    return this;
  }
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
}

/**
 * In-memory logger for testing. Children share the parent's entry list.
 */
export class InMemoryLogger implements Logger {
  private readonly logs: LogEntry[];
  private readonly contextData: Record<string, unknown>;

  constructor(context: Record<string, unknown> = {}, sink: LogEntry[] = []) {
    this.contextData = context;
    this.logs = sink;
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    this.logs.push({ level, message, context: { ...this.contextData, ...context } });
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log("error", message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log("warn", message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log("info", message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log("debug", message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.log("trace", message, context);
  }

  child(context: Record<string, unknown>): Logger {
    return new InMemoryLogger({ ...this.contextData, ...context }, this.logs);
  }

  getLogs(): LogEntry[] {
    return [...this.logs];
  }

  getLogsByLevel(level: LogLevel): Array<{ message: string; context?: Record<string, unknown> }> {
    return this.logs
      .filter((log) => log.level === level)
      .map(({ message, context }) => ({ message, context }));
  }

  clear(): void {
    this.logs.length = 0;
  }
}

/**
 * In-memory metrics collector for testing.
 */
export class InMemoryMetricsCollector implements MetricsCollector {
  private counters: Map<string, number> = new Map();
  private histograms: Map<string, number[]> = new Map();

  private makeKey(name: string, labels?: Record<string, string>): string {
    if (!labels || Object.keys(labels).length === 0) {
      return name;
    }
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${k}=${v}`)
      .join(",");
    return `${name}{${labelStr}}`;
  }

  incrementCounter(name: string, value: number = 1, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  recordHistogram(name: string, value: number, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels);
    const existing = this.histograms.get(key) ?? [];
    existing.push(value);
    this.histograms.set(key, existing);
  }

  getCounter(name: string, labels?: Record<string, string>): number {
    const key = this.makeKey(name, labels);
    return this.counters.get(key) ?? 0;
  }

  getHistogram(name: string, labels?: Record<string, string>): number[] {
    const key = this.makeKey(name, labels);
    return this.histograms.get(key) ?? [];
  }

  clear(): void {
    this.counters.clear();
    this.histograms.clear();
  }
}

/**
 * No-op metrics collector for when metrics are disabled.
 */
export class NoopMetricsCollector implements MetricsCollector {
  incrementCounter(_name: string, _value?: number, _labels?: Record<string, string>): void {}
  recordHistogram(_name: string, _value: number, _labels?: Record<string, string>): void {}
}

/**
 * Create a console logger.
 */
export function createConsoleLogger(level: LogLevel = "info"): Logger {
  return new ConsoleLogger(level);
}

/**
 * Create a no-op logger.
 */
export function createNoopLogger(): Logger {
  return new NoopLogger();
}

/**
 * Create an in-memory logger for testing.
 */
export function createInMemoryLogger(): InMemoryLogger {
  return new InMemoryLogger();
}

/**
 * Create a no-op metrics collector.
 */
export function createNoopMetricsCollector(): MetricsCollector {
  return new NoopMetricsCollector();
}

/**
 * Create an in-memory metrics collector for testing.
 */
export function createInMemoryMetricsCollector(): InMemoryMetricsCollector {
  return new InMemoryMetricsCollector();
}
