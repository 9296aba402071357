import { Injectable, LoggerService as NestLoggerService, Scope } from '@nestjs/common';
import * as winston from 'winston';

export type LogContext = Record<string, unknown>;

let sharedLogger: winston.Logger | undefined;

function createWinstonLogger(): winston.Logger {
  const isDevelopment = process.env.NODE_ENV === 'development';

  return winston.createLogger({
    level: process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info'),
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      isDevelopment ? winston.format.colorize() : winston.format.uncolorize(),
      winston.format.printf((info) => {
        const { timestamp, level, message, context, stack, ...metadata } = info;
        if (isDevelopment) {
          const ctx = context ? `[${context}]` : '';
          const meta = Object.keys(metadata).length > 0 ? ` ${JSON.stringify(metadata)}` : '';
          return `${timestamp} ${level} ${ctx} ${message}${meta}${stack ? `\n${stack}` : ''}`;
        }
        // JSON lines in production
        return JSON.stringify({
          timestamp,
          level,
          context,
          message,
          ...metadata,
          ...(stack ? { stack } : {}),
        });
      }),
    ),
    transports: [
      new winston.transports.Console({
        handleExceptions: true,
        handleRejections: true,
      }),
    ],
  });
}

function getWinstonLogger(): winston.Logger {
  if (!sharedLogger) {
    sharedLogger = createWinstonLogger();
  }
  return sharedLogger;
}

/**
 * Structured logger backed by a process-wide winston instance.
 *
 * Transient scope gives each consumer its own instance, so `setContext`
 * only labels the lines of the service that called it.
 */
@Injectable({ scope: Scope.TRANSIENT })
export class LoggerService implements NestLoggerService {
  private readonly logger = getWinstonLogger();
  private context?: string;

  setContext(context: string) {
    this.context = context;
  }

  log(message: string, context?: string | LogContext, metadata?: LogContext) {
    this.write('info', message, context, metadata);
  }

  error(message: string, trace?: string, context?: string | LogContext, metadata?: LogContext) {
    const ctx = typeof context === 'string' ? context : this.context;
    const meta = typeof context === 'object' ? context : metadata;
    this.logger.error(message, {
      context: ctx,
      stack: trace,
      ...meta,
    });
  }

  warn(message: string, context?: string | LogContext, metadata?: LogContext) {
    this.write('warn', message, context, metadata);
  }

  debug(message: string, context?: string | LogContext, metadata?: LogContext) {
    this.write('debug', message, context, metadata);
  }

  verbose(message: string, context?: string | LogContext, metadata?: LogContext) {
    this.write('verbose', message, context, metadata);
  }

  private write(
    level: 'info' | 'warn' | 'debug' | 'verbose',
    message: string,
    context?: string | LogContext,
    metadata?: LogContext,
  ) {
    // Nest passes its own context name as a string; our services pass metadata objects
    const ctx = typeof context === 'string' ? context : this.context;
    const meta = typeof context === 'object' ? context : metadata;
    this.logger.log(level, message, { context: ctx, ...meta });
  }
}
