import type { Logger } from '../observability/logging.js';
import type { OutputSink } from '../output/sink.js';

/** Collects console writes in order. */
export class CaptureSink implements OutputSink {
  readonly writes: string[] = [];

  write(text: string): void {
    this.writes.push(text);
  }

  get text(): string {
    return this.writes.join('');
  }
}

export interface LogEntry {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  context?: Record<string, unknown>;
}

export class RecordingLogger implements Logger {
  constructor(readonly entries: LogEntry[] = [], private readonly baseContext: Record<string, unknown> = {}) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.record('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.record('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.record('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.record('error', message, context);
  }

  child(context: Record<string, unknown>): Logger {
    return new RecordingLogger(this.entries, { ...this.baseContext, ...context });
  }

  at(level: LogEntry['level']): string[] {
    return this.entries.filter((e) => e.level === level).map((e) => e.message);
  }

  private record(level: LogEntry['level'], message: string, context?: Record<string, unknown>): void {
    const merged = { ...this.baseContext, ...context };
    this.entries.push(Object.keys(merged).length > 0 ? { level, message, context: merged } : { level, message });
  }
}
