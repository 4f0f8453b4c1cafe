import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { RegistrationEntity } from './infrastructure/persistence/relational/entities/registration.entity';
import { RegistrationService } from './registration.service';
import { RegistrationController } from './registration.controller';
import { EventModule } from '../event/event.module';
import { SessionModule } from '../session/session.module';

@Module({
  imports: [
    TypeOrmModule.forFeature([RegistrationEntity]),
    EventModule,
    SessionModule,
  ],
  controllers: [RegistrationController],
  providers: [RegistrationService],
  exports: [RegistrationService],
})
export class RegistrationModule {}
