import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { setupApp } from './app.setup';
import { readPositiveInteger } from './config/config.utils';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug', 'verbose'],
    abortOnError: false,
  });

  setupApp(app);
  app.enableShutdownHooks();

  // ── Start ─────────────────────────────────────────────
  const port = readPositiveInteger(app.get(ConfigService), 'API_PORT', 3000);
  await app.listen(port);

  logger.log(`Admissions API running on http://localhost:${port}`);
}

bootstrap().catch((error: unknown) => {
  const reason = error instanceof Error ? error.stack ?? error.message : String(error);
  new Logger('Bootstrap').error(`Startup failed: ${reason}`);
  process.exit(1);
});
