import {
  CanActivate,
  ExecutionContext,
  ForbiddenException,
  Injectable,
} from '@nestjs/common';
import { AuthenticatedRequest } from '../core/interfaces/authenticated-request.interface';

/** Must run after {@link SessionAuthGuard}. */
@Injectable()
export class AdminGuard implements CanActivate {
  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();

    if (!request.user?.admin) {
      throw new ForbiddenException('Unauthorized access!');
    }

    return true;
  }
}
