import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { EventEntity } from '../../../../event/infrastructure/persistence/relational/entities/event.entity';
import { assertValidEvent } from '../../../../event/event.validation';
import { eventSeedData } from './event-seed.seed';

const DAY_MS = 24 * 60 * 60 * 1000;

@Injectable()
export class EventSeedService {
  private readonly logger = new Logger(EventSeedService.name);

  constructor(
    @InjectRepository(EventEntity)
    private readonly eventRepository: Repository<EventEntity>,
  ) {}

  /** Seeds sample events into an empty table; returns how many were added. */
  async run(now: Date = new Date()): Promise<number> {
    const count = await this.eventRepository.count();
    if (count > 0) {
      this.logger.log(`Skipping event seed, ${count} events present`);
      return 0;
    }

    const events = eventSeedData.map(({ daysFromNow, ...seed }) => {
      const attributes = {
        ...seed,
        startsAt: new Date(now.getTime() + daysFromNow * DAY_MS),
      };
      assertValidEvent(attributes);
      return this.eventRepository.create(attributes);
    });

    await this.eventRepository.save(events);
    this.logger.log(`Seeded ${events.length} events`);

    return events.length;
  }
}
