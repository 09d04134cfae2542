import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ModelModule } from '@admissions/model';
import { HealthModule } from './health/health.module';
import { AuthModule } from './auth/auth.module';
import { PredictionModule } from './prediction/prediction.module';

@Module({
  imports: [
    // ── Configuration ─────────────────────────────────────
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env'],
    }),

    // ── Model ─────────────────────────────────────────────
    ModelModule.forRoot(),

    // ── Feature Modules ───────────────────────────────────
    HealthModule,
    AuthModule,
    PredictionModule,
  ],
})
export class AppModule {}
