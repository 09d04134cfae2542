import { Inject, Injectable } from '@nestjs/common';
import { createHash, timingSafeEqual } from 'crypto';
import { CREDENTIALS } from './auth.constants';
import type { Credential } from './interfaces';

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

/**
 * CredentialStore — read-only username → password table.
 *
 * Passwords are compared as SHA-256 digests with timingSafeEqual, and an
 * unknown username still runs one comparison against a placeholder digest,
 * so response time does not reveal which usernames exist.
 */
@Injectable()
export class CredentialStore {
  private readonly digests: ReadonlyMap<string, Buffer>;
  private readonly placeholder = digest('');

  constructor(@Inject(CREDENTIALS) credentials: readonly Credential[]) {
    const digests = new Map<string, Buffer>();

    for (const { username, password } of credentials) {
      if (digests.has(username)) {
        throw new Error(`Duplicate username in credential table: "${username}"`);
      }
      digests.set(username, digest(password));
    }

    this.digests = digests;
  }

  has(username: string): boolean {
    return this.digests.has(username);
  }

  verify(username: string, password: string): boolean {
    const expected = this.digests.get(username);
    const matches = timingSafeEqual(
      digest(password),
      expected ?? this.placeholder,
    );

    return expected !== undefined && matches;
  }
}
