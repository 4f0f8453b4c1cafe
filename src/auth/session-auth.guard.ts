import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { SessionService } from '../session/session.service';
import { AuthenticatedRequest } from '../core/interfaces/authenticated-request.interface';
import { SignInRequiredException } from './exceptions/sign-in-required.exception';

@Injectable()
export class SessionAuthGuard implements CanActivate {
  constructor(private readonly sessionService: SessionService) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const secureId: unknown =
      request.cookies?.[this.sessionService.getCookieName()];

    if (typeof secureId !== 'string' || secureId.length === 0) {
      throw new SignInRequiredException(this.sessionService.getSignInUrl());
    }

    const session = await this.sessionService.findBySecureId(secureId);
    if (!session) {
      throw new SignInRequiredException(this.sessionService.getSignInUrl());
    }

    request.user = session.user;
    request.session = session;
    return true;
  }
}
