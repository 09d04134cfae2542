import { UnauthorizedException } from '@nestjs/common';

/**
 * Thrown by POST /login when the username/password pair is not in the
 * credential table.
 *
 * HTTP 401 Unauthorized. Same message for unknown user and wrong password.
 */
export class InvalidCredentialsException extends UnauthorizedException {
  constructor() {
    super({
      statusCode: 401,
      error: 'Unauthorized',
      message: 'Incorrect username or password',
    });
  }
}
