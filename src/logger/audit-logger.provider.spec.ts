import { AuditLoggerService } from './audit-logger.provider';
import { LoggingContextStorage } from './logging.context';

describe('AuditLoggerService', () => {
  it('is a singleton', () => {
    expect(AuditLoggerService.getInstance()).toBe(
      AuditLoggerService.getInstance(),
    );
  });

  it('builds one JSON record carrying the request context', () => {
    const record = LoggingContextStorage.run(
      { userId: 1, path: '/events/4/likes', method: 'POST' },
      () =>
        AuditLoggerService.getInstance().buildRecord('info', 'like created', {
          likeId: 3,
          eventId: 4,
        }),
    );

    expect(JSON.parse(record)).toEqual({
      type: 'audit',
      level: 'info',
      message: 'like created',
      context: { likeId: 3, eventId: 4 },
      request: { userId: 1, path: '/events/4/likes', method: 'POST' },
      timestamp: expect.any(String),
    });
  });

  it('writes info records to stdout', () => {
    const logSpy = jest.spyOn(console, 'log').mockImplementation();

    AuditLoggerService.getInstance().log('event deleted', { eventId: 4 });

    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(logSpy.mock.calls[0][0])).toMatchObject({
      level: 'info',
      message: 'event deleted',
      context: { eventId: 4 },
    });
    logSpy.mockRestore();
  });

  it('writes rejected changes as warn records to stderr', () => {
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation();

    AuditLoggerService.getInstance().warn('like rejected', {
      eventId: 4,
      userId: 1,
      reason: 'already liked',
    });

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(JSON.parse(warnSpy.mock.calls[0][0])).toMatchObject({
      type: 'audit',
      level: 'warn',
      message: 'like rejected',
      context: { eventId: 4, userId: 1, reason: 'already liked' },
    });
    warnSpy.mockRestore();
  });
});
