import { Injectable } from '@nestjs/common';
import { stringify } from 'safe-stable-stringify';
import { LoggingContextStorage } from './logging.context';

type AuditLevel = 'info' | 'warn';

/**
 * Writes one structured line per state change (registrations, likes,
 * events) and per rejected change, so they can be shipped separately from
 * application logs.
 */
@Injectable()
export class AuditLoggerService {
  private static instance: AuditLoggerService;

  static getInstance(): AuditLoggerService {
    if (!AuditLoggerService.instance) {
      AuditLoggerService.instance = new AuditLoggerService();
    }
    return AuditLoggerService.instance;
  }

  buildRecord(
    level: AuditLevel,
    message: string,
    context?: Record<string, unknown>,
  ): string {
    return (
      stringify({
        type: 'audit',
        level,
        message,
        context,
        request: LoggingContextStorage.get(),
        timestamp: new Date().toISOString(),
      }) ?? ''
    );
  }

  log(message: string, context?: Record<string, unknown>) {
    console.log(this.buildRecord('info', message, context));
  }

  warn(message: string, context?: Record<string, unknown>) {
    console.warn(this.buildRecord('warn', message, context));
  }
}
