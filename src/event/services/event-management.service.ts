import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { DataSource, Repository } from 'typeorm';
import { EventEntity } from '../infrastructure/persistence/relational/entities/event.entity';
import { RegistrationEntity } from '../../registration/infrastructure/persistence/relational/entities/registration.entity';
import { LikeEntity } from '../../like/infrastructure/persistence/relational/entities/like.entity';
import { CreateEventDto } from '../dto/create-event.dto';
import { UpdateEventDto } from '../dto/update-event.dto';
import { assertValidEvent } from '../event.validation';
import { TransactionHelper } from '../../utils/transaction-helper';
import { AuditLoggerService } from '../../logger/audit-logger.provider';

@Injectable()
export class EventManagementService {
  private readonly auditLogger = AuditLoggerService.getInstance();
  private readonly logger = new Logger(EventManagementService.name);

  constructor(
    @InjectRepository(EventEntity)
    private readonly eventRepository: Repository<EventEntity>,
    @InjectDataSource()
    private readonly dataSource: DataSource,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  /**
   * Persists a new event. Invalid attributes raise a 422 carrying the
   * field-keyed errors.
   */
  async create(createEventDto: CreateEventDto): Promise<EventEntity> {
    assertValidEvent(createEventDto);

    const event = await this.eventRepository.save(
      this.eventRepository.create(createEventDto),
    );

    this.auditLogger.log('event created', {
      eventId: event.id,
      name: event.name,
    });
    this.eventEmitter.emit('event.created', {
      eventId: event.id,
      name: event.name,
    });

    return event;
  }

  async update(
    id: number,
    updateEventDto: UpdateEventDto,
  ): Promise<EventEntity> {
    const event = await this.eventRepository.findOne({ where: { id } });
    if (!event) {
      throw new NotFoundException(`Event with id ${id} not found`);
    }

    assertValidEvent({
      name: event.name,
      description: event.description,
      location: event.location,
      price: event.price,
      capacity: event.capacity,
      startsAt: event.startsAt,
      imageFileName: event.imageFileName,
      ...updateEventDto,
    });

    this.eventRepository.merge(event, updateEventDto);
    const saved = await this.eventRepository.save(event);

    this.logger.debug(`[update] Event ${id} updated`);

    return saved;
  }

  /**
   * Deletes the event together with its likes and registrations in one
   * transaction.
   */
  async remove(id: number): Promise<void> {
    const removed = await TransactionHelper.runInTransaction(
      this.dataSource,
      async (manager) => {
        const event = await manager.findOne(EventEntity, { where: { id } });
        if (!event) {
          throw new NotFoundException(`Event with id ${id} not found`);
        }

        const likes = await manager
          .createQueryBuilder()
          .delete()
          .from(LikeEntity)
          .where('"eventId" = :eventId', { eventId: id })
          .execute();

        const registrations = await manager
          .createQueryBuilder()
          .delete()
          .from(RegistrationEntity)
          .where('"eventId" = :eventId', { eventId: id })
          .execute();

        await manager.delete(EventEntity, { id });

        return {
          event,
          likes: likes.affected ?? 0,
          registrations: registrations.affected ?? 0,
        };
      },
    );

    this.auditLogger.log('event deleted', {
      eventId: id,
      name: removed.event.name,
      likesDeleted: removed.likes,
      registrationsDeleted: removed.registrations,
    });
    this.eventEmitter.emit('event.deleted', {
      eventId: id,
      name: removed.event.name,
    });
  }
}
