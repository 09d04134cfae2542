import type { Credential } from './interfaces';

/**
 * Accounts allowed to log in. Plaintext, fixed at build time; there is no
 * registration flow.
 */
export const DEFAULT_CREDENTIALS: readonly Credential[] = Object.freeze([
  { username: 'admin', password: 'admin123' },
  { username: 'user', password: 'pass123' },
]);
