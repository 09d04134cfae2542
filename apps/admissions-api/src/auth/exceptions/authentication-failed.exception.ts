import { UnauthorizedException } from '@nestjs/common';

/**
 * Thrown by JwtAuthGuard for every rejected bearer token, whatever the
 * underlying AuthFailure. The reason is logged, never returned.
 */
export class AuthenticationFailedException extends UnauthorizedException {
  constructor() {
    super({
      statusCode: 401,
      error: 'Unauthorized',
      message: 'Authentication failed. Please provide a valid JWT token.',
    });
  }
}
