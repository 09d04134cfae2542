import {
  HttpStatus,
  INestApplication,
  ValidationPipe,
  ValidationPipeOptions,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

/**
 * Options of the global ValidationPipe.
 *
 * JSON bodies already carry numbers, so no implicit conversion: a blank
 * string or a boolean in a numeric field is rejected, never coerced to 0.
 */
export const VALIDATION_PIPE_OPTIONS: ValidationPipeOptions = {
  whitelist: true,
  forbidNonWhitelisted: true,
  transform: true,
  errorHttpStatusCode: HttpStatus.UNPROCESSABLE_ENTITY,
};

/**
 * Apply the global HTTP configuration. Shared by main.ts and the e2e specs
 * so both run the same pipeline.
 */
export function setupApp(app: INestApplication): void {
  const configService = app.get(ConfigService);

  // ── Global Pipes ──────────────────────────────────────
  app.useGlobalPipes(new ValidationPipe(VALIDATION_PIPE_OPTIONS));

  // ── CORS ──────────────────────────────────────────────
  app.enableCors({
    origin: configService.get<string>(
      'API_CORS_ORIGIN',
      'http://localhost:3000',
    ),
    credentials: true,
  });
}
