import {
  Body,
  Controller,
  Get,
  Param,
  ParseIntPipe,
  Post,
  UseFilters,
  UseGuards,
} from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { RegistrationService } from './registration.service';
import { CreateRegistrationDto } from './dto/create-registration.dto';
import { RegistrationEntity } from './infrastructure/persistence/relational/entities/registration.entity';
import { SessionAuthGuard } from '../auth/session-auth.guard';
import { SignInRedirectFilter } from '../filters/sign-in-redirect.filter';
import { AuthUser } from '../core/decorators/auth-user.decorator';
import { UserEntity } from '../user/infrastructure/persistence/relational/entities/user.entity';

@ApiTags('Registrations')
@Controller('events/:eventId/registrations')
@UseGuards(SessionAuthGuard)
@UseFilters(SignInRedirectFilter)
export class RegistrationController {
  constructor(private readonly registrationService: RegistrationService) {}

  @Get()
  @ApiOperation({ summary: 'List the registrations for an event' })
  async findAll(
    @Param('eventId', ParseIntPipe) eventId: number,
  ): Promise<RegistrationEntity[]> {
    return this.registrationService.findAllForEvent(eventId);
  }

  @Post()
  @ApiOperation({ summary: 'Register the signed-in user for an event' })
  async create(
    @Param('eventId', ParseIntPipe) eventId: number,
    @Body() createRegistrationDto: CreateRegistrationDto,
    @AuthUser() user: UserEntity,
  ): Promise<RegistrationEntity> {
    return this.registrationService.create(
      eventId,
      user,
      createRegistrationDto,
    );
  }
}
