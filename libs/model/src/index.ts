/**
 * @admissions/model
 *
 * The admissions regression model as seen by the API: the FeatureRecord
 * contract, the PredictionAdapter port, and the in-process linear model
 * loaded from a JSON artifact.
 */

// ── Contracts ───────────────────────────────────────────────
export { FEATURE_NAMES } from './feature-record.interface';
export type { FeatureName, FeatureRecord } from './feature-record.interface';
export type { PredictionAdapter } from './prediction-adapter.interface';

// ── Constants ───────────────────────────────────────────────
export {
  PREDICTION_ADAPTER,
  MODEL_ARTIFACT,
  DEFAULT_MODEL_PATH,
} from './model.constants';

// ── Artifact ────────────────────────────────────────────────
export {
  ModelArtifact,
  ScalerParams,
  loadModelArtifact,
  parseModelArtifact,
} from './model-artifact';
export { ModelArtifactException } from './model.exceptions';

// ── Adapter & Module ────────────────────────────────────────
export { LinearRegressionAdapter } from './linear-regression.adapter';
export { ModelModule } from './model.module';
