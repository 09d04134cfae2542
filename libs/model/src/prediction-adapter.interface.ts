import type { FeatureRecord } from './feature-record.interface';

/**
 * Black-box regression model behind the /predict endpoint.
 *
 * Implementations must be side-effect free and deterministic for a fixed
 * model. The returned value is not guaranteed to lie in [0, 1]; callers clamp.
 * When `signal` aborts, the returned promise rejects and no value is produced.
 */
export interface PredictionAdapter {
  run(record: FeatureRecord, signal?: AbortSignal): Promise<number>;
}
