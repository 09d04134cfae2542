import { Inject, Injectable } from '@nestjs/common';
import {
  HealthCheckError,
  HealthIndicator,
  HealthIndicatorResult,
} from '@nestjs/terminus';
import {
  FeatureRecord,
  MODEL_ARTIFACT,
  ModelArtifact,
  PREDICTION_ADAPTER,
  PredictionAdapter,
} from '@admissions/model';

/** In-range applicant used to probe the model */
const PROBE_RECORD: FeatureRecord = {
  GRE_Score: 320,
  TOEFL_Score: 110,
  University_Rating: 3,
  SOP: 3.5,
  LOR: 3.5,
  CGPA: 8.5,
  Research: 1,
};

/**
 * Readiness indicator: the model is "up" when a probe prediction resolves
 * to a finite number.
 */
@Injectable()
export class ModelHealthIndicator extends HealthIndicator {
  constructor(
    @Inject(PREDICTION_ADAPTER)
    private readonly adapter: PredictionAdapter,
    @Inject(MODEL_ARTIFACT)
    private readonly artifact: ModelArtifact,
  ) {
    super();
  }

  async isReady(key: string): Promise<HealthIndicatorResult> {
    const details = {
      model: this.artifact.name,
      version: this.artifact.version,
    };

    let value: number;
    try {
      value = await this.adapter.run(PROBE_RECORD);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new HealthCheckError(
        'Model probe failed',
        this.getStatus(key, false, { ...details, message }),
      );
    }

    if (!Number.isFinite(value)) {
      throw new HealthCheckError(
        'Model probe returned a non-finite value',
        this.getStatus(key, false, { ...details, message: `returned ${value}` }),
      );
    }

    return this.getStatus(key, true, details);
  }
}
