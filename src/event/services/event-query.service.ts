import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository, SelectQueryBuilder } from 'typeorm';
import { EventEntity } from '../infrastructure/persistence/relational/entities/event.entity';
import {
  DEFAULT_RECENT_LIMIT,
  EventFilter,
} from '../../core/constants/constant';
import { QueryEventDto } from '../dto/query-events.dto';

/**
 * Read side of events. Every query maps `registrationsCount` so callers can
 * ask an event for `spotsLeft()` and `isSoldOut()` without another trip.
 */
@Injectable()
export class EventQueryService {
  private readonly logger = new Logger(EventQueryService.name);

  constructor(
    @InjectRepository(EventEntity)
    private readonly eventRepository: Repository<EventEntity>,
  ) {}

  private createEventQuery(): SelectQueryBuilder<EventEntity> {
    return this.eventRepository
      .createQueryBuilder('event')
      .loadRelationCountAndMap(
        'event.registrationsCount',
        'event.registrations',
      );
  }

  /** Events starting after `now`, soonest first. */
  async upcoming(now: Date = new Date()): Promise<EventEntity[]> {
    return this.createEventQuery()
      .where('event.startsAt > :now', { now })
      .orderBy('event.startsAt', 'ASC')
      .getMany();
  }

  /** Events that started before `now`, oldest first. */
  async past(now: Date = new Date()): Promise<EventEntity[]> {
    return this.createEventQuery()
      .where('event.startsAt < :now', { now })
      .orderBy('event.startsAt', 'ASC')
      .getMany();
  }

  /** Upcoming events with a $0 price, soonest first. */
  async free(now: Date = new Date()): Promise<EventEntity[]> {
    return this.createEventQuery()
      .where('event.startsAt > :now', { now })
      .andWhere('event.price = :price', { price: 0 })
      .orderBy('event.startsAt', 'ASC')
      .getMany();
  }

  /**
   * The `limit` most recently started past events, most recent first.
   * Unlike {@link past} the order is descending.
   */
  async recent(
    limit: number = DEFAULT_RECENT_LIMIT,
    now: Date = new Date(),
  ): Promise<EventEntity[]> {
    return this.createEventQuery()
      .where('event.startsAt < :now', { now })
      .orderBy('event.startsAt', 'DESC')
      .limit(limit)
      .getMany();
  }

  async list(query: QueryEventDto): Promise<EventEntity[]> {
    const filter = query.filter ?? EventFilter.Upcoming;
    this.logger.debug(`Listing ${filter} events`);

    switch (filter) {
      case EventFilter.Past:
        return this.past();
      case EventFilter.Free:
        return this.free();
      case EventFilter.Recent:
        return this.recent(query.limit);
      case EventFilter.Upcoming:
        return this.upcoming();
    }
  }

  async findOne(id: number): Promise<EventEntity> {
    const event = await this.createEventQuery()
      .leftJoinAndSelect('event.likes', 'like')
      .leftJoinAndSelect('like.user', 'liker')
      .where('event.id = :id', { id })
      .getOne();

    if (!event) {
      throw new NotFoundException(`Event with id ${id} not found`);
    }

    return event;
  }

  async exists(id: number): Promise<boolean> {
    return this.eventRepository.exists({ where: { id } });
  }
}
