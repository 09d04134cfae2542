import { Inject, Injectable, Logger } from '@nestjs/common';
import { AuthOptions } from './auth.config';
import { AUTH_OPTIONS, BEARER_PREFIX } from './auth.constants';
import { CredentialStore } from './credential-store.service';
import { AuthFailure, TokenDecodeFailure } from './enums';
import { fail, ok, Result } from './result';
import { TokenCodec } from './token-codec.service';

/**
 * AuthService — decides login success and per-request authorization.
 *
 * Both operations return a Result instead of throwing, so the service has
 * no knowledge of HTTP. AuthController and JwtAuthGuard translate failures
 * into 401 responses.
 *
 * Stateless apart from read-only configuration: concurrent calls need no
 * coordination.
 */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    private readonly credentialStore: CredentialStore,
    private readonly tokenCodec: TokenCodec,
    @Inject(AUTH_OPTIONS) private readonly options: AuthOptions,
  ) {}

  /**
   * Check a username/password pair and issue an access token for it.
   */
  login(username: string, password: string): Result<string, AuthFailure> {
    if (!this.credentialStore.verify(username, password)) {
      this.logger.warn(`Login rejected for username "${username}"`);
      return fail(AuthFailure.INVALID_CREDENTIALS);
    }

    const token = this.tokenCodec.encode(username, this.options.tokenTtlSeconds);

    this.logger.log(`User logged in: ${username}`);

    return ok(token);
  }

  /**
   * Resolve the raw Authorization header of a request to a username.
   */
  authorize(authorizationHeader: string | undefined): Result<string, AuthFailure> {
    if (!authorizationHeader) {
      return fail(AuthFailure.MISSING_TOKEN);
    }

    if (!authorizationHeader.startsWith(BEARER_PREFIX)) {
      return fail(AuthFailure.MALFORMED_HEADER);
    }

    const decoded = this.tokenCodec.decode(
      authorizationHeader.slice(BEARER_PREFIX.length),
    );

    if (!decoded.ok) {
      return fail(
        decoded.reason === TokenDecodeFailure.EXPIRED
          ? AuthFailure.TOKEN_EXPIRED
          : AuthFailure.INVALID_TOKEN,
      );
    }

    // Account may have been removed after the token was issued
    if (!this.credentialStore.has(decoded.value.subject)) {
      return fail(AuthFailure.UNKNOWN_SUBJECT);
    }

    return ok(decoded.value.subject);
  }
}
