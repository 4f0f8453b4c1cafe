import { DataSource } from 'typeorm';
import { Logger } from '@nestjs/common';
import { EventSeedService } from './event-seed.service';
import { EventEntity } from '../../../../event/infrastructure/persistence/relational/entities/event.entity';
import { EventQueryService } from '../../../../event/services/event-query.service';
import { createTestDataSource } from '../../../../test/utils/test-data-source';

describe('EventSeedService', () => {
  let dataSource: DataSource;
  let service: EventSeedService;
  let logSpy: jest.SpyInstance;

  beforeEach(async () => {
    logSpy = jest.spyOn(Logger.prototype, 'log').mockImplementation();
    dataSource = await createTestDataSource();
    service = new EventSeedService(dataSource.getRepository(EventEntity));
  });

  afterEach(async () => {
    logSpy.mockRestore();
    await dataSource.destroy();
  });

  it('seeds an empty table once', async () => {
    const now = new Date();

    expect(await service.run(now)).toBe(4);
    expect(await service.run(now)).toBe(0);
    expect(await dataSource.getRepository(EventEntity).count()).toBe(4);
  });

  it('spreads the sample events over upcoming and past', async () => {
    const now = new Date();
    await service.run(now);
    const queries = new EventQueryService(
      dataSource.getRepository(EventEntity),
    );

    expect((await queries.upcoming(now)).map((event) => event.name)).toEqual([
      'BugSmash',
      'Hackathon',
      'Kata Camp',
    ]);
    expect((await queries.past(now)).map((event) => event.name)).toEqual([
      'Coffee Code',
    ]);
    expect((await queries.free(now)).map((event) => event.name)).toEqual([
      'BugSmash',
    ]);
  });
});
