/** NestJS injection token for the parsed AuthOptions */
export const AUTH_OPTIONS = 'AUTH_OPTIONS';

/** NestJS injection token for the credential table */
export const CREDENTIALS = 'CREDENTIALS';

/** NestJS injection token for the Clock used for token timestamps */
export const CLOCK = 'CLOCK';

/** HMAC algorithms accepted for signing access tokens */
export const SIGNING_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;

export type SigningAlgorithm = (typeof SIGNING_ALGORITHMS)[number];

export const DEFAULT_SIGNING_ALGORITHM: SigningAlgorithm = 'HS256';

export const DEFAULT_TOKEN_TTL_MINUTES = 30;

export const BEARER_PREFIX = 'Bearer ';
