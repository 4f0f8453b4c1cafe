import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { LikeEntity } from './infrastructure/persistence/relational/entities/like.entity';
import { LikeService } from './like.service';
import { LikeController } from './like.controller';
import { EventModule } from '../event/event.module';
import { SessionModule } from '../session/session.module';

@Module({
  imports: [TypeOrmModule.forFeature([LikeEntity]), EventModule, SessionModule],
  controllers: [LikeController],
  providers: [LikeService],
  exports: [LikeService],
})
export class LikeModule {}
