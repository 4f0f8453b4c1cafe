import {
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  UseFilters,
  UseGuards,
} from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { LikeService } from './like.service';
import { LikeEntity } from './infrastructure/persistence/relational/entities/like.entity';
import { SessionAuthGuard } from '../auth/session-auth.guard';
import { SignInRedirectFilter } from '../filters/sign-in-redirect.filter';
import { AuthUser } from '../core/decorators/auth-user.decorator';
import { UserEntity } from '../user/infrastructure/persistence/relational/entities/user.entity';
import { LikerDto } from '../event/dto/event-response.dto';

@ApiTags('Likes')
@Controller('events/:eventId/likes')
@UseFilters(SignInRedirectFilter)
export class LikeController {
  constructor(private readonly likeService: LikeService) {}

  @Get()
  @ApiOperation({ summary: 'List the users who liked an event' })
  async findLikers(
    @Param('eventId', ParseIntPipe) eventId: number,
  ): Promise<LikerDto[]> {
    const likers = await this.likeService.findLikers(eventId);
    return likers.map(({ id, name, username }) => ({ id, name, username }));
  }

  @Post()
  @UseGuards(SessionAuthGuard)
  @ApiOperation({ summary: 'Like an event as the signed-in user' })
  async create(
    @Param('eventId', ParseIntPipe) eventId: number,
    @AuthUser() user: UserEntity,
  ): Promise<LikeEntity> {
    return this.likeService.create(eventId, user);
  }

  @Delete(':id')
  @UseGuards(SessionAuthGuard)
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: "Remove the signed-in user's like" })
  async remove(
    @Param('eventId', ParseIntPipe) eventId: number,
    @Param('id', ParseIntPipe) id: number,
    @AuthUser() user: UserEntity,
  ): Promise<void> {
    await this.likeService.remove(eventId, id, user);
  }
}
