import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Raised when a request needs a signed-in user. Rendered as a redirect to
 * the sign-in page by {@link SignInRedirectFilter}, not as a 401.
 */
export class SignInRequiredException extends HttpException {
  constructor(readonly signInUrl: string) {
    super('Please sign in first!', HttpStatus.FOUND);
  }
}
