import { ConsoleLogger, LoggerService, LogLevel } from '@nestjs/common';
import { AppConfig } from '../config/app-config.type';
import { SimpleLogger } from './simple.logger';
import { JsonLogger } from './json.logger';

/**
 * JSON lines when `APP_LOG_FORMAT=json`, plain timestamped lines in
 * production and Nest's coloured console otherwise.
 */
export function createLogger({
  nodeEnv,
  logFormat,
}: Pick<AppConfig, 'nodeEnv' | 'logFormat'>): LoggerService {
  const production = nodeEnv === 'production';
  const levels: LogLevel[] = production
    ? ['error', 'warn', 'log']
    : ['error', 'warn', 'log', 'debug', 'verbose'];

  if (logFormat === 'json') {
    const logger = new JsonLogger();
    logger.setLogLevels(levels);
    return logger;
  }

  if (production) {
    const logger = new SimpleLogger();
    logger.setLogLevels(levels);
    return logger;
  }

  const logger = new ConsoleLogger();
  logger.setLogLevels(levels);
  return logger;
}
