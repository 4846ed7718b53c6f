/**
 * Structured JSON logger.
 *
 * One JSON line per entry with severity, message, timestamp, bound context
 * and call data. Sensitive keys are redacted before output.
 */

export type Severity = 'debug' | 'info' | 'warn' | 'error';

const SEVERITY_ORDER: Record<Severity, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const DEFAULT_REDACTED_KEYS = [/api[_-]?key/i, /token/i, /secret/i, /password/i, /authorization/i];

const REDACTED = '[REDACTED]';

export interface LogEntry {
  severity: Severity;
  message: string;
  timestamp: string;
  [key: string]: unknown;
}

/**
 * Receives finished log entries. The default sink writes JSON lines to the console.
 */
export type LogSink = (entry: LogEntry) => void;

export interface LoggerConfig {
  /** Minimum severity to log. */
  minSeverity?: Severity;
  /** Fields added to every entry. */
  context?: Record<string, unknown>;
  sink?: LogSink;
  /** Extra key patterns to redact. */
  redactedKeys?: RegExp[];
}

export const consoleSink: LogSink = (entry) => {
  const line = JSON.stringify(entry);
  if (entry.severity === 'error') {
    console.error(line);
  } else {
    console.log(line);
  }
};

export class Logger {
  private readonly minSeverity: Severity;
  private readonly context: Record<string, unknown>;
  private readonly sink: LogSink;
  private readonly redactedKeys: RegExp[];

  constructor(config: LoggerConfig = {}) {
    this.minSeverity = config.minSeverity ?? 'info';
    this.context = config.context ?? {};
    this.sink = config.sink ?? consoleSink;
    this.redactedKeys = [...DEFAULT_REDACTED_KEYS, ...(config.redactedKeys ?? [])];
  }

  /**
   * Create a logger that adds `context` to every entry.
   */
  child(context: Record<string, unknown>): Logger {
    return new Logger({
      minSeverity: this.minSeverity,
      context: { ...this.context, ...context },
      sink: this.sink,
      redactedKeys: this.redactedKeys,
    });
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log('error', message, { ...data, ...formatError(error) });
  }

  isEnabled(severity: Severity): boolean {
    return SEVERITY_ORDER[severity] >= SEVERITY_ORDER[this.minSeverity];
  }

  private log(severity: Severity, message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled(severity)) {
      return;
    }
    const entry: LogEntry = {
      severity,
      message,
      timestamp: new Date().toISOString(),
      ...this.redact(this.context),
      ...this.redact(data ?? {}),
    };
    this.sink(entry);
  }

  private redact(data: Record<string, unknown>): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      if (this.redactedKeys.some((pattern) => pattern.test(key))) {
        out[key] = REDACTED;
      } else if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
        out[key] = value instanceof Date ? value.toISOString() : this.redact({ ...value });
      } else {
        out[key] = value;
      }
    }
    return out;
  }
}

function formatError(error: unknown): Record<string, unknown> {
  if (error === undefined) {
    return {};
  }
  if (error instanceof Error) {
    return { error: { name: error.name, message: error.message, stack: error.stack } };
  }
  return { error: { message: String(error) } };
}

let processLogger = new Logger();

/**
 * The process-wide logger used by the engine.
 */
export function getLogger(): Logger {
  return processLogger;
}

/**
 * Replace the process-wide logger. Returns the previous one.
 */
export function setLogger(logger: Logger): Logger {
  const previous = processLogger;
  processLogger = logger;
  return previous;
}
