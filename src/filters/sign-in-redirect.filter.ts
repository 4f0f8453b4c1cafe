import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { SignInRequiredException } from '../auth/exceptions/sign-in-required.exception';

@Catch(SignInRequiredException)
export class SignInRedirectFilter implements ExceptionFilter {
  private readonly logger = new Logger(SignInRedirectFilter.name);

  catch(exception: SignInRequiredException, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    this.logger.debug(
      `Redirecting ${request.method} ${request.url} to ${exception.signInUrl}`,
    );

    response.redirect(HttpStatus.FOUND, exception.signInUrl);
  }
}
