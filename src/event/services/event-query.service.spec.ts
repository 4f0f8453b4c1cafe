import { NotFoundException } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { EventQueryService } from './event-query.service';
import { EventEntity } from '../infrastructure/persistence/relational/entities/event.entity';
import { EventFilter } from '../../core/constants/constant';
import {
  createTestDataSource,
  insertEvent,
  insertLike,
  insertRegistration,
  insertUser,
  monthsFrom,
} from '../../test/utils/test-data-source';

describe('EventQueryService', () => {
  let dataSource: DataSource;
  let service: EventQueryService;
  let now: Date;

  const names = (events: EventEntity[]) => events.map((event) => event.name);

  beforeEach(async () => {
    dataSource = await createTestDataSource();
    service = new EventQueryService(dataSource.getRepository(EventEntity));
    now = new Date();

    // inserted out of order so the ORDER BY is what sorts them
    await insertEvent(dataSource, {
      name: 'Future 2',
      startsAt: monthsFrom(now, 2),
    });
    await insertEvent(dataSource, {
      name: 'Past 3',
      startsAt: monthsFrom(now, -3),
    });
    await insertEvent(dataSource, {
      name: 'Future 1',
      startsAt: monthsFrom(now, 1),
      price: 0,
    });
    await insertEvent(dataSource, {
      name: 'Past 1',
      startsAt: monthsFrom(now, -1),
    });
    await insertEvent(dataSource, {
      name: 'Future 3',
      startsAt: monthsFrom(now, 3),
    });
    await insertEvent(dataSource, {
      name: 'Past 2',
      startsAt: monthsFrom(now, -2),
      price: 0,
    });
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  describe('upcoming', () => {
    it('returns future events, soonest first', async () => {
      expect(names(await service.upcoming(now))).toEqual([
        'Future 1',
        'Future 2',
        'Future 3',
      ]);
    });
  });

  describe('past', () => {
    it('returns past events, oldest first', async () => {
      expect(names(await service.past(now))).toEqual([
        'Past 3',
        'Past 2',
        'Past 1',
      ]);
    });
  });

  describe('free', () => {
    it('returns only upcoming events with a price of 0', async () => {
      const events = await service.free(now);

      expect(names(events)).toEqual(['Future 1']);
      expect(events[0].isFree()).toBe(true);
    });
  });

  describe('recent', () => {
    it('returns the given number of past events, most recent first', async () => {
      expect(names(await service.recent(2, now))).toEqual(['Past 1', 'Past 2']);
    });

    it('returns three events by default', async () => {
      await insertEvent(dataSource, {
        name: 'Past 4',
        startsAt: monthsFrom(now, -4),
      });

      expect(names(await service.recent(undefined, now))).toEqual([
        'Past 1',
        'Past 2',
        'Past 3',
      ]);
    });
  });

  describe('list', () => {
    it('defaults to upcoming events', async () => {
      expect(names(await service.list({}))).toEqual([
        'Future 1',
        'Future 2',
        'Future 3',
      ]);
    });

    it('dispatches on the filter', async () => {
      expect(names(await service.list({ filter: EventFilter.Past }))).toEqual([
        'Past 3',
        'Past 2',
        'Past 1',
      ]);
      expect(names(await service.list({ filter: EventFilter.Free }))).toEqual([
        'Future 1',
      ]);
      expect(
        names(await service.list({ filter: EventFilter.Recent, limit: 1 })),
      ).toEqual(['Past 1']);
    });
  });

  describe('findOne', () => {
    it('loads the registration count and the likers', async () => {
      const event = await insertEvent(dataSource, {
        name: 'Lunch & Learn',
        capacity: 3,
        startsAt: monthsFrom(now, 1),
      });
      const attendee = await insertUser(dataSource, { name: 'Moe' });
      const fan = await insertUser(dataSource, { name: 'Curly' });
      await insertRegistration(dataSource, event, attendee);
      await insertLike(dataSource, event, fan);

      const found = await service.findOne(event.id);

      expect(found.registrationCount).toBe(1);
      expect(found.spotsLeft()).toBe(2);
      expect(found.likers.map((user) => user.name)).toEqual(['Curly']);
    });

    it('counts one spot less per registration', async () => {
      const event = await insertEvent(dataSource, {
        capacity: 2,
        startsAt: monthsFrom(now, 1),
      });

      expect((await service.findOne(event.id)).spotsLeft()).toBe(2);

      await insertRegistration(dataSource, event, await insertUser(dataSource));
      expect((await service.findOne(event.id)).spotsLeft()).toBe(1);

      await insertRegistration(dataSource, event, await insertUser(dataSource));
      const soldOut = await service.findOne(event.id);
      expect(soldOut.spotsLeft()).toBe(0);
      expect(soldOut.isSoldOut()).toBe(true);
    });

    it('throws NotFoundException for an unknown id', async () => {
      await expect(service.findOne(9999)).rejects.toThrow(NotFoundException);
    });
  });

  describe('exists', () => {
    it('reports whether the event is stored', async () => {
      const event = await insertEvent(dataSource);

      expect(await service.exists(event.id)).toBe(true);
      expect(await service.exists(9999)).toBe(false);
    });
  });
});
