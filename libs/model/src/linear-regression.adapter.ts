import type { FeatureRecord } from './feature-record.interface';
import type { ModelArtifact } from './model-artifact';
import type { PredictionAdapter } from './prediction-adapter.interface';

/**
 * In-process PredictionAdapter evaluating a linear model:
 *
 *   y = intercept + Σ coefficients[i] · scaled(record[features[i]])
 *
 * where `scaled` is the identity unless the artifact carries scaler params.
 */
export class LinearRegressionAdapter implements PredictionAdapter {
  constructor(private readonly artifact: ModelArtifact) {}

  async run(record: FeatureRecord, signal?: AbortSignal): Promise<number> {
    signal?.throwIfAborted();

    const { features, coefficients, intercept, scaler } = this.artifact;

    return features.reduce((sum, feature, index) => {
      const value = scaler
        ? (record[feature] - scaler.mean[index]) / scaler.scale[index]
        : record[feature];
      return sum + coefficients[index] * value;
    }, intercept);
  }
}
