import {
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { LoggingContextStorage } from './logging.context';
import { AuthenticatedRequest } from '../core/interfaces/authenticated-request.interface';

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();

    const eventId = Number(request.params?.eventId);

    LoggingContextStorage.set({
      userId: request.user?.id,
      eventId: Number.isInteger(eventId) ? eventId : undefined,
      path: request.path,
      method: request.method,
    });

    return next.handle();
  }
}
