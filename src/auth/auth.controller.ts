import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Post,
  Req,
  Res,
  UseFilters,
  UseGuards,
} from '@nestjs/common';
import { ApiOperation, ApiTags } from '@nestjs/swagger';
import { Response } from 'express';
import { AuthService } from './auth.service';
import { AuthSignInDto } from './dto/auth-sign-in.dto';
import { SessionService } from '../session/session.service';
import { SessionAuthGuard } from './session-auth.guard';
import { SignInRedirectFilter } from '../filters/sign-in-redirect.filter';
import { AuthenticatedRequest } from '../core/interfaces/authenticated-request.interface';
import { UserEntity } from '../user/infrastructure/persistence/relational/entities/user.entity';

@ApiTags('Session')
@Controller('session')
@UseFilters(SignInRedirectFilter)
export class AuthController {
  constructor(
    private readonly authService: AuthService,
    private readonly sessionService: SessionService,
  ) {}

  @Get('new')
  @ApiOperation({ summary: 'Sign-in entry point' })
  signInForm() {
    return {
      message: 'Sign in with your email or username and password',
      action: { method: 'POST', path: '/session' },
      fields: ['emailOrUsername', 'password'],
    };
  }

  @Post()
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Sign in and start a session' })
  async signIn(
    @Body() signInDto: AuthSignInDto,
    @Res({ passthrough: true }) response: Response,
  ): Promise<UserEntity> {
    const session = await this.authService.signIn(signInDto);

    response.cookie(
      this.sessionService.getCookieName(),
      session.secureId,
      this.sessionService.getCookieOptions(),
    );

    return session.user;
  }

  @Delete()
  @UseGuards(SessionAuthGuard)
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Sign out' })
  async signOut(
    @Req() request: AuthenticatedRequest,
    @Res({ passthrough: true }) response: Response,
  ): Promise<void> {
    if (request.session) {
      await this.authService.signOut(request.session);
    }
    response.clearCookie(this.sessionService.getCookieName());
  }
}
