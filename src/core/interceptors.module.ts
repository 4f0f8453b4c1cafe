import { Module } from '@nestjs/common';
import { APP_INTERCEPTOR, APP_FILTER } from '@nestjs/core';
import { LoggingInterceptor } from '../logger/logging.interceptor';
import { GlobalExceptionFilter } from '../filters/global-exception.filter';

/**
 * Application-wide interceptors and filters, registered through the Nest
 * tokens so they take part in dependency injection.
 */
@Module({
  providers: [
    LoggingInterceptor,
    GlobalExceptionFilter,
    {
      provide: APP_INTERCEPTOR,
      useExisting: LoggingInterceptor,
    },
    {
      provide: APP_FILTER,
      useExisting: GlobalExceptionFilter,
    },
  ],
  exports: [LoggingInterceptor, GlobalExceptionFilter],
})
export class InterceptorsModule {}
