/**
 * Logging infrastructure for the completion client.
 *
 * Every line goes to stderr: stdout is reserved for model output so that
 * `openrouter-prompt ask ... > answer.md` captures only the response.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
export type LogFormat = 'text' | 'json';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Creates a child logger that adds `context` to every entry. */
  child(context: Record<string, unknown>): Logger;
}

export interface LogConfig {
  level: LogLevel;
  format: LogFormat;
  timestamps: boolean;
}

export const DEFAULT_LOG_CONFIG: LogConfig = {
  level: 'info',
  format: 'text',
  timestamps: false,
};

/** Destination for formatted log lines. */
export type LogWriter = (line: string) => void;

const stderrWriter: LogWriter = (line) => {
  process.stderr.write(`${line}\n`);
};

export class ConsoleLogger implements Logger {
  private readonly config: LogConfig;

  constructor(
    config: Partial<LogConfig> = {},
    private readonly baseContext: Record<string, unknown> = {},
    private readonly write: LogWriter = stderrWriter
  ) {
    this.config = { ...DEFAULT_LOG_CONFIG, ...config };
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

  child(context: Record<string, unknown>): Logger {
    return new ConsoleLogger(this.config, { ...this.baseContext, ...context }, this.write);
  }

  private log(level: Exclude<LogLevel, 'silent'>, message: string, context?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.config.level]) {
      return;
    }

    const merged = { ...this.baseContext, ...context };
    const timestamp = this.config.timestamps ? new Date().toISOString() : undefined;

    if (this.config.format === 'json') {
      this.write(JSON.stringify({ timestamp, level, message, ...merged }));
      return;
    }

    const parts: string[] = [];
    if (timestamp) parts.push(`[${timestamp}]`);
    parts.push(`[${level.toUpperCase()}]`);
    parts.push(message);
    if (Object.keys(merged).length > 0) {
      parts.push(JSON.stringify(merged));
    }
    this.write(parts.join(' '));
  }
}

export class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  child(_context: Record<string, unknown>): Logger {
    return this;
  }
}

export function createLogger(config: Partial<LogConfig> = {}): Logger {
  return new ConsoleLogger(config);
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
