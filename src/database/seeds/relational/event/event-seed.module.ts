import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { EventSeedService } from './event-seed.service';
import { EventEntity } from '../../../../event/infrastructure/persistence/relational/entities/event.entity';

@Module({
  imports: [TypeOrmModule.forFeature([EventEntity])],
  providers: [EventSeedService],
  exports: [EventSeedService],
})
export class EventSeedModule {}
