/**
 * Component logger.
 *
 * Format: [wisp:<component>:<timestamp>] LEVEL message | {context}
 *
 * Output goes through a single process-wide sink so tests and embedders can
 * capture it with `configureLogging({ sink })`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogEntry {
  level: Exclude<LogLevel, 'silent'>;
  component: string;
  message: string;
  timestamp: string;
  context?: Record<string, unknown>;
}

export type LogSink = (entry: LogEntry, line: string) => void;

export interface LoggerConfig {
  level?: LogLevel;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

const defaultSink: LogSink = (entry, line) => {
  if (entry.level === 'error' || entry.level === 'warn') {
    console.error(line);
  } else {
    console.log(line);
  }
};

const envLevel = process.env.WISP_LOG_LEVEL;

const globalConfig: { level: LogLevel; sink: LogSink } = {
  level: isLogLevel(envLevel) ? envLevel : 'info',
  sink: defaultSink,
};

/**
 * Set the process-wide default level and/or sink.
 * Loggers created with an explicit level keep it.
 */
export function configure(options: { level?: LogLevel; sink?: LogSink }): void {
  if (options.level) globalConfig.level = options.level;
  if (options.sink) globalConfig.sink = options.sink;
}

/** Restore the default console sink and the environment level. */
export function resetLogging(): void {
  globalConfig.level = isLogLevel(envLevel) ? envLevel : 'info';
  globalConfig.sink = defaultSink;
}

export function formatLogLine(entry: LogEntry): string {
  const ctx = entry.context && Object.keys(entry.context).length > 0
    ? ` | ${JSON.stringify(entry.context)}`
    : '';
  return `[wisp:${entry.component}:${entry.timestamp}] ${entry.level.toUpperCase()} ${entry.message}${ctx}`;
}

export class Logger {
  readonly component: string;
  private readonly level?: LogLevel;

  constructor(component: string, config: LoggerConfig = {}) {
    this.component = component;
    this.level = config.level;
  }

  get effectiveLevel(): LogLevel {
    return this.level ?? globalConfig.level;
  }

  isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.effectiveLevel];
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  /** A logger for a sub-component, e.g. `connection` -> `connection:transport`. */
  child(name: string): Logger {
    return new Logger(`${this.component}:${name}`, { level: this.level });
  }

  private log(level: Exclude<LogLevel, 'silent'>, message: string, context?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;
    const entry: LogEntry = {
      level,
      component: this.component,
      message,
      timestamp: new Date().toISOString(),
      context,
    };
    globalConfig.sink(entry, formatLogLine(entry));
  }
}

export function createLogger(component: string, config?: LoggerConfig): Logger {
  return new Logger(component, config);
}
