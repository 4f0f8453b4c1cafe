import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';

interface EventChangedPayload {
  eventId: number;
  name: string;
}

interface RegistrationCreatedPayload {
  registrationId: number;
  eventId: number;
  userId: number;
}

interface LikeChangedPayload {
  likeId: number;
  eventId: number;
  userId: number;
}

@Injectable()
export class EventListener {
  private readonly logger = new Logger(EventListener.name);

  @OnEvent('event.created')
  handleEventCreatedEvent(params: EventChangedPayload): void {
    this.logger.log(`event.created ${params.eventId} (${params.name})`);
  }

  @OnEvent('event.deleted')
  handleEventDeletedEvent(params: EventChangedPayload): void {
    this.logger.log(`event.deleted ${params.eventId} (${params.name})`);
  }

  @OnEvent('registration.created')
  handleRegistrationCreatedEvent(params: RegistrationCreatedPayload): void {
    this.logger.log(
      `registration.created ${params.registrationId} for event ${params.eventId} by user ${params.userId}`,
    );
  }

  @OnEvent('like.created')
  handleLikeCreatedEvent(params: LikeChangedPayload): void {
    this.logger.log(
      `like.created ${params.likeId} for event ${params.eventId} by user ${params.userId}`,
    );
  }

  @OnEvent('like.deleted')
  handleLikeDeletedEvent(params: LikeChangedPayload): void {
    this.logger.log(
      `like.deleted ${params.likeId} for event ${params.eventId} by user ${params.userId}`,
    );
  }

  @OnEvent('user.created')
  handleUserCreatedEvent(params: { userId: number }): void {
    this.logger.log(`user.created ${params.userId}`);
  }
}
