import { ConfigService } from '@nestjs/config';

/**
 * Read a positive integer setting.
 *
 * Environment variables arrive as strings, so `configService.get<number>()`
 * alone does not produce a number. Unset or empty values yield `fallback`.
 *
 * @throws Error if the value is present but not a positive integer
 */
export function readPositiveInteger(
  configService: ConfigService,
  key: string,
  fallback: number,
): number {
  const raw = configService.get<string | number>(key);

  if (raw === undefined || raw === '') {
    return fallback;
  }

  const value = typeof raw === 'number' ? raw : Number(raw.trim());

  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${key} must be a positive integer, got "${raw}"`);
  }

  return value;
}
