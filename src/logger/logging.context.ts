import { AsyncLocalStorage } from 'async_hooks';

export interface LoggingContext {
  userId?: number;
  eventId?: number;
  path?: string;
  method?: string;
}

export class LoggingContextStorage {
  private static storage = new AsyncLocalStorage<LoggingContext>();

  static get(): LoggingContext {
    return this.storage.getStore() || {};
  }

  static run<T>(context: LoggingContext, next: () => T): T {
    return this.storage.run(context, next);
  }

  static set(context: Partial<LoggingContext>) {
    const current = this.get();
    this.storage.enterWith({ ...current, ...context });
  }
}
