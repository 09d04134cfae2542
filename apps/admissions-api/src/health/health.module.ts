import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { HealthController } from './health.controller';
import { ModelHealthIndicator } from './model.health';

@Module({
  imports: [TerminusModule],
  controllers: [HealthController],
  providers: [ModelHealthIndicator],
})
export class HealthModule {}
