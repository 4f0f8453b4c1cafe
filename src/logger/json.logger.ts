import { ConsoleLogger, LogLevel } from '@nestjs/common';
import { stringify } from 'safe-stable-stringify';
import { LoggingContextStorage } from './logging.context';

export class JsonLogger extends ConsoleLogger {
  protected formatMessage(
    logLevel: LogLevel,
    message: unknown,
    pidMessage: string,
    formattedLogLevel: string,
    contextMessage: string,
    timestampDiff: string,
  ): string {
    const pid = pidMessage.replace(/[[\]]/g, '').trim();
    // eslint-disable-next-line no-control-regex
    const context = contextMessage.replace(/\u001b\[\d+[\d;]*m/g, '').trim();

    const logEntry = {
      timestamp: new Date().toISOString(),
      level: logLevel,
      message,
      context: context.replace(/^\[|\]$/g, '') || undefined,
      pid: pid || undefined,
      ms: timestampDiff
        ? parseFloat(timestampDiff.replace('ms', ''))
        : undefined,
      ...LoggingContextStorage.get(),
    };

    // safe-stable-stringify replaces circular references instead of throwing
    return `${stringify(logEntry)}\n`;
  }

  protected colorize(message: string): string {
    return message;
  }
}
