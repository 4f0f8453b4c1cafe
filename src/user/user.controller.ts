import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Res,
} from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { Response } from 'express';
import { UserService, UserProfile } from './user.service';
import { CreateUserDto } from './dto/create-user.dto';
import { SessionService } from '../session/session.service';
import { UserEntity } from './infrastructure/persistence/relational/entities/user.entity';

@ApiTags('Users')
@Controller('users')
export class UserController {
  constructor(
    private readonly userService: UserService,
    private readonly sessionService: SessionService,
  ) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Sign up; the new user is signed in' })
  async create(
    @Body() createUserDto: CreateUserDto,
    @Res({ passthrough: true }) response: Response,
  ): Promise<UserEntity> {
    const user = await this.userService.create(createUserDto);
    const session = await this.sessionService.create(user);

    response.cookie(
      this.sessionService.getCookieName(),
      session.secureId,
      this.sessionService.getCookieOptions(),
    );

    return user;
  }

  @Get(':id')
  @ApiOperation({ summary: 'User profile with registrations and likes' })
  async findOne(@Param('id', ParseIntPipe) id: number): Promise<UserProfile> {
    return this.userService.findProfile(id);
  }
}
