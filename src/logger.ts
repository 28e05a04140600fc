/**
 * Engine Logger
 *
 * One JSON object per line. Every entry carries the correlation id of the
 * operation it belongs to, so a swap, its legs and any bridge warnings can
 * be followed together: {prefix}_{timestamp_hex}_{random}.
 */

import { AmmError, getErrorMessage } from './errors';
import type { LogLevel, CorrelationPrefix, OperationContext, LogEntry, LoggerOptions } from './types';

type LogFields = Record<string, unknown>;

const LEVEL_RANK: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

/** Destination and threshold shared by a logger and its children */
interface LogSink {
  service: string;
  threshold: number;
  minLevel: LogLevel;
  write: (line: string) => void;
}

function encodeEntry(entry: LogEntry): string {
  return JSON.stringify(entry, (_key, value: unknown) =>
    typeof value === 'bigint' ? value.toString() : value
  );
}

function elapsedMs(ctx: OperationContext): number {
  return Date.now() - ctx.started_at.getTime();
}

export class Logger {
  private readonly sink: LogSink;

  constructor(
    service: string,
    private readonly component?: string,
    options: LoggerOptions = {}
  ) {
    const minLevel = options.minLevel ?? 'DEBUG';
    this.sink = {
      service,
      minLevel,
      threshold: LEVEL_RANK[minLevel],
      write: options.output ?? console.log,
    };
  }

  static generateCorrelationId(prefix: CorrelationPrefix): string {
    const seconds = Math.floor(Date.now() / 1000).toString(16);
    const suffix = Math.random().toString(36).slice(2, 6).padEnd(4, '0');
    return `${prefix}_${seconds}_${suffix}`;
  }

  /** Logger for another component writing to the same sink */
  child(component: string): Logger {
    return new Logger(this.sink.service, component, {
      minLevel: this.sink.minLevel,
      output: this.sink.write,
    });
  }

  startOperation(prefix: CorrelationPrefix): OperationContext {
    return { correlation_id: Logger.generateCorrelationId(prefix), started_at: new Date() };
  }

  debug(ctx: OperationContext, eventType: string, message: string, fields?: LogFields): void {
    this.emit('DEBUG', ctx, eventType, message, fields);
  }

  info(ctx: OperationContext, eventType: string, message: string, fields?: LogFields): void {
    this.emit('INFO', ctx, eventType, message, fields);
  }

  warn(ctx: OperationContext, eventType: string, message: string, fields?: LogFields): void {
    this.emit('WARN', ctx, eventType, message, fields);
  }

  error(ctx: OperationContext, eventType: string, message: string, fields?: LogFields): void {
    this.emit('ERROR', ctx, eventType, message, fields);
  }

  /** INFO entry closing an operation, stamped with its duration */
  complete(ctx: OperationContext, eventType: string, message: string, fields?: LogFields): void {
    this.emit('INFO', ctx, eventType, message, { ...fields, duration_ms: elapsedMs(ctx) });
  }

  /**
   * ERROR entry for an operation that was rolled back. Engine errors
   * contribute their code; anything else is reported as UNEXPECTED.
   */
  failure(ctx: OperationContext, eventType: string, error: unknown, fields?: LogFields): void {
    this.emit('ERROR', ctx, eventType, getErrorMessage(error), {
      ...fields,
      error_code: error instanceof AmmError ? error.code : 'UNEXPECTED',
      duration_ms: elapsedMs(ctx),
    });
  }

  private emit(
    level: LogLevel,
    ctx: OperationContext,
    eventType: string,
    message: string,
    fields: LogFields = {}
  ): void {
    if (LEVEL_RANK[level] < this.sink.threshold) return;

    this.sink.write(
      encodeEntry({
        timestamp: new Date().toISOString(),
        level,
        correlation_id: ctx.correlation_id,
        service: this.sink.service,
        ...(this.component && { component: this.component }),
        event_type: eventType,
        message,
        context: fields,
      })
    );
  }
}
