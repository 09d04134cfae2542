import { Controller, Get } from '@nestjs/common';
import { HealthCheck, HealthCheckService } from '@nestjs/terminus';
import type { HealthCheckResult } from '@nestjs/terminus';
import { ModelHealthIndicator } from './model.health';

export interface LivenessResponse {
  status: 'healthy';
}

@Controller('health')
export class HealthController {
  constructor(
    private readonly health: HealthCheckService,
    private readonly model: ModelHealthIndicator,
  ) {}

  /** Liveness: answers whenever the process is reachable */
  @Get()
  check(): LivenessResponse {
    return { status: 'healthy' };
  }

  /** Readiness: 503 unless the model answers a probe prediction */
  @Get('ready')
  @HealthCheck()
  ready(): Promise<HealthCheckResult> {
    return this.health.check([() => this.model.isReady('model')]);
  }
}
