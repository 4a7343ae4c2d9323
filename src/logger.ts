/**
 * Leveled, contextual logger. Messages go to a LogSink (console by default)
 * as one formatted line: `[level] (context) message {data}`.
 *
 * Views take a Logger through CubeViewOptions; pass one at level 'debug'
 * to trace snapshot construction and slice clamping, or 'silent' to mute
 * everything.
 */

// ─── Types ────────────────────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogData = Readonly<Record<string, unknown>>;

/** Anything with console's four leveled methods. */
export interface LogSink {
  debug(line: string): void;
  info(line:  string): void;
  warn(line:  string): void;
  error(line: string): void;
}

export interface LoggerOptions {
  level?:   LogLevel;
  context?: string;
  sink?:    LogSink;
}

// ─── Level priority ───────────────────────────────────────────────────────────

const LEVEL_PRIORITY: Readonly<Record<LogLevel, number>> = {
  debug:  0,
  info:   1,
  warn:   2,
  error:  3,
  silent: 4,
};

// ─── Formatting ───────────────────────────────────────────────────────────────

// bigint members show up in log data (coordinates); JSON.stringify throws on
// them without a replacer.
function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? `${value}n` : value;
}

function formatData(data: LogData): string {
  try {
    return JSON.stringify(data, bigintReplacer);
  } catch (err) {
    // Circular structures: keep the line, drop the payload.
    return `<unserializable data: ${err instanceof Error ? err.message : String(err)}>`;
  }
}

// ─── Logger ───────────────────────────────────────────────────────────────────

export class Logger {
  readonly level:   LogLevel;
  readonly context: string;
  private readonly sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.level   = options.level   ?? 'info';
    this.context = options.context ?? '';
    this.sink    = options.sink    ?? console;
  }

  /** True when a message at `level` would reach the sink. */
  enabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.level];
  }

  debug(message: string, data?: LogData): void {
    if (this.enabled('debug')) this.sink.debug(this.format('debug', message, data));
  }

  info(message: string, data?: LogData): void {
    if (this.enabled('info')) this.sink.info(this.format('info', message, data));
  }

  warn(message: string, data?: LogData): void {
    if (this.enabled('warn')) this.sink.warn(this.format('warn', message, data));
  }

  error(message: string, data?: LogData): void {
    if (this.enabled('error')) this.sink.error(this.format('error', message, data));
  }

  /** A logger writing to the same sink with `context` appended (`parent:child`). */
  child(context: string): Logger {
    return new Logger({
      level:   this.level,
      context: this.context ? `${this.context}:${context}` : context,
      sink:    this.sink,
    });
  }

  private format(level: LogLevel, message: string, data?: LogData): string {
    const ctx  = this.context ? ` (${this.context})` : '';
    const tail = data !== undefined ? ` ${formatData(data)}` : '';
    return `[${level}]${ctx} ${message}${tail}`;
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}
