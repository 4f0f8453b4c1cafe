import {
  HttpStatus,
  Injectable,
  NotFoundException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { Repository } from 'typeorm';
import { LikeEntity } from './infrastructure/persistence/relational/entities/like.entity';
import { EventQueryService } from '../event/services/event-query.service';
import { UserEntity } from '../user/infrastructure/persistence/relational/entities/user.entity';
import { AuditLoggerService } from '../logger/audit-logger.provider';
import { isUniqueViolation } from '../utils/database-errors';

@Injectable()
export class LikeService {
  private readonly auditLogger = AuditLoggerService.getInstance();

  constructor(
    @InjectRepository(LikeEntity)
    private readonly likeRepository: Repository<LikeEntity>,
    private readonly eventQueryService: EventQueryService,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  async create(eventId: number, user: UserEntity): Promise<LikeEntity> {
    const event = await this.eventQueryService.findOne(eventId);

    const alreadyLiked = await this.likeRepository.exists({
      where: { event: { id: eventId }, user: { id: user.id } },
    });
    if (alreadyLiked) {
      throw this.alreadyLiked(eventId, user);
    }

    let like: LikeEntity;
    try {
      like = await this.likeRepository.save(
        this.likeRepository.create({ event, user }),
      );
    } catch (error) {
      // A concurrent like of the same event wins the unique index.
      if (isUniqueViolation(error)) {
        throw this.alreadyLiked(eventId, user);
      }
      throw error;
    }

    this.auditLogger.log('like created', {
      likeId: like.id,
      eventId,
      userId: user.id,
    });
    this.eventEmitter.emit('like.created', {
      likeId: like.id,
      eventId,
      userId: user.id,
    });

    return like;
  }

  /** Other users' likes are reported as missing. */
  async remove(
    eventId: number,
    likeId: number,
    user: UserEntity,
  ): Promise<void> {
    const like = await this.likeRepository.findOne({
      where: { id: likeId, event: { id: eventId }, user: { id: user.id } },
    });
    if (!like) {
      throw new NotFoundException(`Like with ID ${likeId} not found`);
    }

    await this.likeRepository.remove(like);

    this.auditLogger.log('like deleted', { likeId, eventId, userId: user.id });
    this.eventEmitter.emit('like.deleted', {
      likeId,
      eventId,
      userId: user.id,
    });
  }

  private alreadyLiked(
    eventId: number,
    user: UserEntity,
  ): UnprocessableEntityException {
    this.auditLogger.warn('like rejected', {
      eventId,
      userId: user.id,
      reason: 'already liked',
    });
    return new UnprocessableEntityException({
      status: HttpStatus.UNPROCESSABLE_ENTITY,
      errors: { event: 'Event is already liked' },
    });
  }

  async findLikers(eventId: number): Promise<UserEntity[]> {
    const event = await this.eventQueryService.findOne(eventId);
    return event.likers;
  }
}
