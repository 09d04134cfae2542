import { ConfigService } from '@nestjs/config';
import { readPositiveInteger } from '../config/config.utils';
import {
  DEFAULT_SIGNING_ALGORITHM,
  DEFAULT_TOKEN_TTL_MINUTES,
  SIGNING_ALGORITHMS,
  SigningAlgorithm,
} from './auth.constants';

/**
 * Process-wide token settings, parsed once at startup and immutable after.
 */
export interface AuthOptions {
  readonly secret: string;
  readonly algorithm: SigningAlgorithm;
  readonly tokenTtlSeconds: number;
}

function isSigningAlgorithm(value: string): value is SigningAlgorithm {
  return SIGNING_ALGORITHMS.some((algorithm) => algorithm === value);
}

/**
 * Build AuthOptions from JWT_SECRET, JWT_ALGORITHM and
 * ACCESS_TOKEN_EXPIRE_MINUTES.
 *
 * @throws Error on a missing secret, an unsupported algorithm or a
 *   non-positive lifetime. The application cannot start without valid
 *   token settings.
 */
export function loadAuthOptions(configService: ConfigService): AuthOptions {
  const secret = configService.get<string>('JWT_SECRET');

  if (!secret) {
    throw new Error(
      'JWT_SECRET is not defined. Set it in the environment or your .env file.',
    );
  }

  const algorithm = configService.get<string>(
    'JWT_ALGORITHM',
    DEFAULT_SIGNING_ALGORITHM,
  );

  if (!isSigningAlgorithm(algorithm)) {
    throw new Error(
      `JWT_ALGORITHM "${algorithm}" is not supported. Use one of: ${SIGNING_ALGORITHMS.join(', ')}`,
    );
  }

  const ttlMinutes = readPositiveInteger(
    configService,
    'ACCESS_TOKEN_EXPIRE_MINUTES',
    DEFAULT_TOKEN_TTL_MINUTES,
  );

  return {
    secret,
    algorithm,
    tokenTtlSeconds: ttlMinutes * 60,
  };
}
