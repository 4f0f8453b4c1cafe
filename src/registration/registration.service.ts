import {
  HttpStatus,
  Injectable,
  Logger,
  UnprocessableEntityException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { Repository } from 'typeorm';
import { RegistrationEntity } from './infrastructure/persistence/relational/entities/registration.entity';
import { CreateRegistrationDto } from './dto/create-registration.dto';
import { EventQueryService } from '../event/services/event-query.service';
import { UserEntity } from '../user/infrastructure/persistence/relational/entities/user.entity';
import { AuditLoggerService } from '../logger/audit-logger.provider';

@Injectable()
export class RegistrationService {
  private readonly auditLogger = AuditLoggerService.getInstance();
  private readonly logger = new Logger(RegistrationService.name);

  constructor(
    @InjectRepository(RegistrationEntity)
    private readonly registrationRepository: Repository<RegistrationEntity>,
    private readonly eventQueryService: EventQueryService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  /**
   * Reserves a spot for the user. Sold-out events reject the registration
   * with a 422.
   */
  async create(
    eventId: number,
    user: UserEntity,
    createRegistrationDto: CreateRegistrationDto,
  ): Promise<RegistrationEntity> {
    const event = await this.eventQueryService.findOne(eventId);

    if (event.isSoldOut()) {
      this.logger.debug(`Event ${eventId} is sold out`);
      this.auditLogger.warn('registration rejected', {
        eventId,
        userId: user.id,
        reason: 'sold out',
      });
      throw new UnprocessableEntityException({
        status: HttpStatus.UNPROCESSABLE_ENTITY,
        errors: { event: 'Event is sold out' },
      });
    }

    const registration = await this.registrationRepository.save(
      this.registrationRepository.create({
        howHeard: createRegistrationDto.howHeard,
        event,
        user,
      }),
    );

    this.auditLogger.log('registration created', {
      registrationId: registration.id,
      eventId,
      userId: user.id,
    });
    this.eventEmitter.emit('registration.created', {
      registrationId: registration.id,
      eventId,
      userId: user.id,
    });

    return registration;
  }

  /** Registrations for the event, newest first. */
  async findAllForEvent(eventId: number): Promise<RegistrationEntity[]> {
    await this.eventQueryService.findOne(eventId);

    return this.registrationRepository.find({
      where: { event: { id: eventId } },
      relations: { user: true },
      order: { createdAt: 'DESC', id: 'DESC' },
    });
  }

  async countForEvent(eventId: number): Promise<number> {
    return this.registrationRepository.count({
      where: { event: { id: eventId } },
    });
  }
}
