import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
} from '@nestjs/common';
import type { Request } from 'express';
import { AuthService } from '../auth.service';
import { AuthenticationFailedException } from '../exceptions';
import type { RequestUser } from '../interfaces';

/**
 * JWT Authentication Guard — protects routes that require a bearer token.
 *
 * Usage:
 * ```ts
 * @UseGuards(JwtAuthGuard)
 * @Post('predict')
 * predict(@CurrentUser() user: RequestUser) { ... }
 * ```
 *
 * Guards run before pipes, so a rejected request never reaches body
 * validation or the handler. On success, request.user is set.
 */
@Injectable()
export class JwtAuthGuard implements CanActivate {
  private readonly logger = new Logger(JwtAuthGuard.name);

  constructor(private readonly authService: AuthService) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context
      .switchToHttp()
      .getRequest<Request & { user?: RequestUser }>();

    const result = this.authService.authorize(request.headers.authorization);

    if (!result.ok) {
      this.logger.debug(
        `JWT auth rejected for ${request.method} ${request.originalUrl}: ${result.reason}`,
      );
      throw new AuthenticationFailedException();
    }

    request.user = { username: result.value };
    return true;
  }
}
