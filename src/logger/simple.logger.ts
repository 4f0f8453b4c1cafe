import { LoggerService, LogLevel } from '@nestjs/common';

export class SimpleLogger implements LoggerService {
  private logLevels: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

  private getTimestamp(): string {
    return new Date().toISOString();
  }

  private format(message: unknown, context?: string): string {
    const text =
      typeof message === 'string' ? message : JSON.stringify(message);
    return context
      ? `[${this.getTimestamp()}] [${context}] ${text}`
      : `[${this.getTimestamp()}] ${text}`;
  }

  setLogLevels(levels: LogLevel[]) {
    this.logLevels = levels;
  }

  log(message: unknown, context?: string) {
    if (this.logLevels.includes('log')) {
      console.log(this.format(message, context));
    }
  }

  error(message: unknown, trace?: string, context?: string) {
    if (this.logLevels.includes('error')) {
      console.error(this.format(message, context));
      if (trace) console.error(`[${this.getTimestamp()}] ${trace}`);
    }
  }

  warn(message: unknown, context?: string) {
    if (this.logLevels.includes('warn')) {
      console.warn(this.format(message, context));
    }
  }

  debug(message: unknown, context?: string) {
    if (this.logLevels.includes('debug')) {
      console.debug(this.format(message, context));
    }
  }

  verbose(message: unknown, context?: string) {
    if (this.logLevels.includes('verbose')) {
      console.log(this.format(message, context));
    }
  }
}
