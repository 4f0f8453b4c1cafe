import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { EventController } from './event.controller';
import { EventEntity } from './infrastructure/persistence/relational/entities/event.entity';
import { EventListener } from './event.listener';
import { EventManagementService } from './services/event-management.service';
import { EventQueryService } from './services/event-query.service';
import { SessionModule } from '../session/session.module';

@Module({
  imports: [TypeOrmModule.forFeature([EventEntity]), SessionModule],
  controllers: [EventController],
  providers: [EventManagementService, EventQueryService, EventListener],
  exports: [EventManagementService, EventQueryService],
})
export class EventModule {}
