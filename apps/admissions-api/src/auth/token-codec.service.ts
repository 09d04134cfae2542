import { Inject, Injectable } from '@nestjs/common';
import { JwtService } from '@nestjs/jwt';
import { CLOCK } from './auth.constants';
import { Clock } from './clock';
import { TokenDecodeFailure } from './enums';
import type { Claims, JwtPayload } from './interfaces';
import { fail, ok, Result } from './result';

/** Payload as it comes out of signature verification, before shape checks */
type UnverifiedPayload = { [K in keyof JwtPayload]?: unknown };

function toNumericDate(epochMs: number): number {
  return Math.floor(epochMs / 1000);
}

/**
 * Map a jsonwebtoken verification error to a decode failure.
 * Errors are matched by name so a second copy of jsonwebtoken in
 * node_modules cannot defeat an instanceof check.
 */
function toDecodeFailure(error: unknown): TokenDecodeFailure {
  if (!(error instanceof Error)) {
    throw error;
  }

  switch (error.name) {
    case 'TokenExpiredError':
      return TokenDecodeFailure.EXPIRED;
    case 'JsonWebTokenError':
      return error.message === 'invalid signature'
        ? TokenDecodeFailure.SIGNATURE_INVALID
        : TokenDecodeFailure.MALFORMED;
    case 'NotBeforeError':
      return TokenDecodeFailure.MALFORMED;
    default:
      throw error;
  }
}

/**
 * TokenCodec — signs and verifies stateless access tokens.
 *
 * Tokens are HMAC-signed JWTs carrying `sub`, `iat` and `exp`. Secret and
 * algorithm come from JwtModule registration (see AuthModule); the current
 * time comes from the injected Clock, for both issuing and checking expiry.
 *
 * Expiry has one-second resolution: a token issued at second `t` with a
 * lifetime of `ttl` seconds is rejected from second `t + ttl` on.
 */
@Injectable()
export class TokenCodec {
  constructor(
    private readonly jwtService: JwtService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  encode(subject: string, ttlSeconds: number): string {
    const issuedAt = toNumericDate(this.clock.now());
    const payload: JwtPayload = {
      sub: subject,
      iat: issuedAt,
      exp: issuedAt + ttlSeconds,
    };

    return this.jwtService.sign(payload);
  }

  decode(token: string): Result<Claims, TokenDecodeFailure> {
    let payload: UnverifiedPayload;

    try {
      payload = this.jwtService.verify<UnverifiedPayload>(token, {
        clockTimestamp: toNumericDate(this.clock.now()),
      });
    } catch (error) {
      return fail(toDecodeFailure(error));
    }

    // Signed by us but not in the shape we issue
    if (typeof payload.sub !== 'string' || typeof payload.exp !== 'number') {
      return fail(TokenDecodeFailure.MALFORMED);
    }

    return ok({
      subject: payload.sub,
      expiresAt: new Date(payload.exp * 1000),
    });
  }
}
