/** NestJS injection token for the active PredictionAdapter */
export const PREDICTION_ADAPTER = 'PREDICTION_ADAPTER';

/** NestJS injection token for the loaded ModelArtifact */
export const MODEL_ARTIFACT = 'MODEL_ARTIFACT';

/** Artifact location used when MODEL_PATH is not set, relative to the working directory */
export const DEFAULT_MODEL_PATH = 'models/admissions-model.json';
