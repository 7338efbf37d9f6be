/**
 * Logging and metrics for the AppMetrica export client.
 */

// ============================================================================
// Logging
// ============================================================================

/**
 * Log levels in order of severity.
 */
export enum LogLevel {
  Trace = 0,
  Debug = 1,
  Info = 2,
  Warn = 3,
  Error = 4,
}

export type LogContext = Record<string, unknown>;

/**
 * Logger interface.
 */
export interface Logger {
  trace(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(context: LogContext): Logger;
}

/**
 * A single captured log entry.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  context: LogContext;
  timestamp: Date;
}

const SENSITIVE_KEYS = new Set(['token', 'oauth', 'oauth_token', 'authorization', 'secret']);

/**
 * Replaces the values of sensitive keys, recursing into nested objects.
 */
export function redactSensitive(context: LogContext): LogContext {
  const result: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    if (SENSITIVE_KEYS.has(key.toLowerCase())) {
      result[key] = '[REDACTED]';
    } else if (isPlainObject(value)) {
      result[key] = redactSensitive(value);
    } else {
      result[key] = value;
    }
  }
  return result;
}

function isPlainObject(value: unknown): value is LogContext {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    && Object.getPrototypeOf(value) === Object.prototype;
}

/**
 * Console logger implementation.
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel;
  private readonly context: LogContext;
  private readonly format: 'json' | 'pretty';
  private readonly write: (line: string) => void;

  constructor(options: {
    level?: LogLevel;
    context?: LogContext;
    format?: 'json' | 'pretty';
    write?: (line: string) => void;
  } = {}) {
    this.level = options.level ?? LogLevel.Info;
    this.context = options.context ?? {};
    this.format = options.format ?? 'pretty';
    this.write = options.write ?? ((line) => console.log(line));
  }

  trace(message: string, context?: LogContext): void {
    this.log(LogLevel.Trace, message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log(LogLevel.Debug, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log(LogLevel.Info, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log(LogLevel.Warn, message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log(LogLevel.Error, message, context);
  }

  child(context: LogContext): Logger {
    return new ConsoleLogger({
      level: this.level,
      context: { ...this.context, ...context },
      format: this.format,
      write: this.write,
    });
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (level < this.level) return;

    const merged = redactSensitive({ ...this.context, ...context });
    const timestamp = new Date().toISOString();
    const levelName = LogLevel[level].toUpperCase();

    if (this.format === 'json') {
      this.write(JSON.stringify({ timestamp, level: levelName, message, ...merged }));
      return;
    }

    const suffix = Object.keys(merged).length > 0 ? ` ${JSON.stringify(merged)}` : '';
    this.write(`[${timestamp}] ${levelName}: ${message}${suffix}`);
  }
}

/**
 * No-op logger, used when the caller does not supply one.
 */
export class NoopLogger implements Logger {
  trace(): void { /* noop */ }
  debug(): void { /* noop */ }
  info(): void { /* noop */ }
  warn(): void { /* noop */ }
  error(): void { /* noop */ }
  child(_context: LogContext): Logger { return this; }
}

/**
 * In-memory logger for testing. Children share the parent's entries.
 */
export class InMemoryLogger implements Logger {
  private readonly entries: LogEntry[];
  private readonly context: LogContext;

  constructor(context: LogContext = {}, entries: LogEntry[] = []) {
    this.context = context;
    this.entries = entries;
  }

  trace(message: string, context?: LogContext): void {
    this.add(LogLevel.Trace, message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.add(LogLevel.Debug, message, context);
  }

  info(message: string, context?: LogContext): void {
    this.add(LogLevel.Info, message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.add(LogLevel.Warn, message, context);
  }

  error(message: string, context?: LogContext): void {
    this.add(LogLevel.Error, message, context);
  }

  child(context: LogContext): Logger {
    return new InMemoryLogger({ ...this.context, ...context }, this.entries);
  }

  getLogs(): LogEntry[] {
    return [...this.entries];
  }

  getLogsByLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((entry) => entry.level === level);
  }

  clear(): void {
    this.entries.length = 0;
  }

  private add(level: LogLevel, message: string, context?: LogContext): void {
    this.entries.push({
      level,
      message,
      context: redactSensitive({ ...this.context, ...context }),
      timestamp: new Date(),
    });
  }
}

// ============================================================================
// Metrics
// ============================================================================

/**
 * Metrics collector interface.
 */
export interface MetricsCollector {
  incrementCounter(name: string, value?: number, labels?: Record<string, string>): void;
  recordHistogram(name: string, value: number, labels?: Record<string, string>): void;
}

/**
 * Metric names emitted by the export client.
 */
export const MetricNames = {
  /** Exports started */
  EXPORTS_TOTAL: 'appmetrica_exports_total',
  /** Exports that returned a payload */
  EXPORTS_SUCCESS: 'appmetrica_exports_success',
  /** Exports that ended in an error */
  EXPORTS_FAILED: 'appmetrica_exports_failed',
  /** Polls answered with 201/202 */
  EXPORT_POLLS: 'appmetrica_export_polls',
  /** End-to-end export latency in seconds */
  EXPORT_LATENCY: 'appmetrica_export_latency_seconds',
} as const;

export class NoopMetricsCollector implements MetricsCollector {
  incrementCounter(): void { /* noop */ }
  recordHistogram(): void { /* noop */ }
}

/**
 * In-memory metrics collector for testing.
 */
export class InMemoryMetricsCollector implements MetricsCollector {
  private readonly counters = new Map<string, number>();
  private readonly histograms = new Map<string, number[]>();

  incrementCounter(name: string, value: number = 1, labels?: Record<string, string>): void {
    const key = metricKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  recordHistogram(name: string, value: number, labels?: Record<string, string>): void {
    const key = metricKey(name, labels);
    const values = this.histograms.get(key) ?? [];
    values.push(value);
    this.histograms.set(key, values);
  }

  getCounter(name: string, labels?: Record<string, string>): number {
    return this.counters.get(metricKey(name, labels)) ?? 0;
  }

  getHistogram(name: string, labels?: Record<string, string>): number[] {
    return this.histograms.get(metricKey(name, labels)) ?? [];
  }

  clear(): void {
    this.counters.clear();
    this.histograms.clear();
  }
}

/**
 * Builds a Prometheus-style series key, labels sorted by name.
 */
function metricKey(name: string, labels?: Record<string, string>): string {
  if (!labels || Object.keys(labels).length === 0) {
    return name;
  }
  const rendered = Object.entries(labels)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}="${v}"`)
    .join(',');
  return `${name}{${rendered}}`;
}
