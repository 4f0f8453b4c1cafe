import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Patch,
  Post,
  Query,
  UseFilters,
  UseGuards,
} from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { CreateEventDto } from './dto/create-event.dto';
import { UpdateEventDto } from './dto/update-event.dto';
import { QueryEventDto } from './dto/query-events.dto';
import { EventResponseDto } from './dto/event-response.dto';
import { EventManagementService } from './services/event-management.service';
import { EventQueryService } from './services/event-query.service';
import { SessionAuthGuard } from '../auth/session-auth.guard';
import { AdminGuard } from '../auth/admin.guard';
import { SignInRedirectFilter } from '../filters/sign-in-redirect.filter';

@ApiTags('Events')
@Controller('events')
@UseFilters(SignInRedirectFilter)
export class EventController {
  constructor(
    private readonly eventManagementService: EventManagementService,
    private readonly eventQueryService: EventQueryService,
  ) {}

  @Get()
  @ApiOperation({
    summary: 'List events. Defaults to upcoming events, soonest first.',
  })
  async findAll(@Query() query: QueryEventDto): Promise<EventResponseDto[]> {
    const events = await this.eventQueryService.list(query);
    return events.map((event) => EventResponseDto.fromEntity(event));
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get an event with its likers' })
  async findOne(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<EventResponseDto> {
    const event = await this.eventQueryService.findOne(id);
    return EventResponseDto.fromEntity(event);
  }

  @Post()
  @UseGuards(SessionAuthGuard, AdminGuard)
  @ApiOperation({ summary: 'Create an event' })
  async create(
    @Body() createEventDto: CreateEventDto,
  ): Promise<EventResponseDto> {
    const event = await this.eventManagementService.create(createEventDto);
    return EventResponseDto.fromEntity(event);
  }

  @Patch(':id')
  @UseGuards(SessionAuthGuard, AdminGuard)
  @ApiOperation({ summary: 'Update an event' })
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() updateEventDto: UpdateEventDto,
  ): Promise<EventResponseDto> {
    const event = await this.eventManagementService.update(id, updateEventDto);
    return EventResponseDto.fromEntity(event);
  }

  @Delete(':id')
  @UseGuards(SessionAuthGuard, AdminGuard)
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({
    summary: 'Delete an event together with its registrations and likes',
  })
  async remove(@Param('id', ParseIntPipe) id: number): Promise<void> {
    await this.eventManagementService.remove(id);
  }
}
