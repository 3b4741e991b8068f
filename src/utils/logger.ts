import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';
import { Request, Response, NextFunction } from 'express';

export enum LogSeverity {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  NOTICE = 'NOTICE',
  WARNING = 'WARNING',
  ERROR = 'ERROR',
  CRITICAL = 'CRITICAL'
}

const SEVERITY_RANK: Record<LogSeverity, number> = {
  [LogSeverity.DEBUG]: 0,
  [LogSeverity.INFO]: 1,
  [LogSeverity.NOTICE]: 2,
  [LogSeverity.WARNING]: 3,
  [LogSeverity.ERROR]: 4,
  [LogSeverity.CRITICAL]: 5
};

interface LogContext {
  requestId?: string;
  method?: string;
  path?: string;
  subject?: string;
  [key: string]: string | undefined;
}

interface StructuredLogEntry {
  severity: LogSeverity;
  message: string;
  timestamp: string;
  [key: string]: unknown;
}

type LogSink = (line: string) => void;

export function parseLogSeverity(value: string): LogSeverity | undefined {
  const upper = value.trim().toUpperCase();
  return Object.values(LogSeverity).find((severity) => severity === upper);
}

class StructuredLogger {
  private asyncLocalStorage = new AsyncLocalStorage<LogContext>();
  private threshold: LogSeverity = LogSeverity.INFO;
  private sink: LogSink = (line) => console.log(line);

  setLevel(severity: LogSeverity) {
    this.threshold = severity;
  }

  /**
   * Replace the output sink. Tests use this to capture entries.
   */
  setSink(sink: LogSink) {
    this.sink = sink;
  }

  runWithContext<T>(context: LogContext, fn: () => T): T {
    return this.asyncLocalStorage.run(context, fn);
  }

  /**
   * Express middleware that opens a logging context for the request.
   * An incoming X-Request-Id is reused, otherwise one is generated.
   */
  middleware() {
    return (req: Request, res: Response, next: NextFunction) => {
      const context: LogContext = {
        requestId: req.header('X-Request-Id') || randomUUID(),
        method: req.method,
        path: req.path
      };
      this.runWithContext(context, () => {
        next();
      });
    };
  }

  private log(severity: LogSeverity, message: string, metadata?: Record<string, unknown>) {
    if (SEVERITY_RANK[severity] < SEVERITY_RANK[this.threshold]) {
      return;
    }

    const context = this.asyncLocalStorage.getStore() || {};

    const entry: StructuredLogEntry = {
      severity,
      message,
      timestamp: new Date().toISOString(),
      ...metadata
    };

    Object.keys(context).forEach(key => {
      if (context[key] !== undefined) {
        entry[`context.${key}`] = context[key];
      }
    });

    this.sink(JSON.stringify(entry));
  }

  debug(message: string, metadata?: Record<string, unknown>) {
    this.log(LogSeverity.DEBUG, message, metadata);
  }

  info(message: string, metadata?: Record<string, unknown>) {
    this.log(LogSeverity.INFO, message, metadata);
  }

  notice(message: string, metadata?: Record<string, unknown>) {
    this.log(LogSeverity.NOTICE, message, metadata);
  }

  warning(message: string, metadata?: Record<string, unknown>) {
    this.log(LogSeverity.WARNING, message, metadata);
  }

  error(message: string, error?: unknown, metadata?: Record<string, unknown>) {
    const errorMetadata = {
      ...metadata,
      error: error instanceof Error ? {
        name: error.name,
        message: error.message,
        stack: error.stack
      } : error === undefined ? undefined : { message: String(error) }
    };
    this.log(LogSeverity.ERROR, message, errorMetadata);
  }

  critical(message: string, metadata?: Record<string, unknown>) {
    this.log(LogSeverity.CRITICAL, message, metadata);
  }

  /**
   * Add fields to the current request's logging context
   */
  addContext(context: LogContext) {
    const currentContext = this.asyncLocalStorage.getStore();
    if (currentContext) {
      Object.assign(currentContext, context);
    }
  }
}

export const logger = new StructuredLogger();

/**
 * Shortened form of a token that is safe to put in a log entry.
 */
export function tokenPreview(token: string): string {
  return token.substring(0, 8) + '...';
}

export type { LogContext, StructuredLogEntry, StructuredLogger };
