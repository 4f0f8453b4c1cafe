import { Logger } from '@nestjs/common';
import { EventListener } from './event.listener';

describe('EventListener', () => {
  let listener: EventListener;
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(Logger.prototype, 'log').mockImplementation();
    listener = new EventListener();
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  it('logs created and deleted events', () => {
    listener.handleEventCreatedEvent({ eventId: 4, name: 'BugSmash' });
    listener.handleEventDeletedEvent({ eventId: 4, name: 'BugSmash' });

    expect(logSpy).toHaveBeenNthCalledWith(1, 'event.created 4 (BugSmash)');
    expect(logSpy).toHaveBeenNthCalledWith(2, 'event.deleted 4 (BugSmash)');
  });

  it('logs registrations and likes', () => {
    listener.handleRegistrationCreatedEvent({
      registrationId: 9,
      eventId: 4,
      userId: 1,
    });
    listener.handleLikeCreatedEvent({ likeId: 3, eventId: 4, userId: 1 });
    listener.handleLikeDeletedEvent({ likeId: 3, eventId: 4, userId: 1 });

    expect(logSpy.mock.calls).toEqual([
      ['registration.created 9 for event 4 by user 1'],
      ['like.created 3 for event 4 by user 1'],
      ['like.deleted 3 for event 4 by user 1'],
    ]);
  });
});
