import { DynamicModule, Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { resolve } from 'path';
import { LinearRegressionAdapter } from './linear-regression.adapter';
import { loadModelArtifact, ModelArtifact } from './model-artifact';
import {
  DEFAULT_MODEL_PATH,
  MODEL_ARTIFACT,
  PREDICTION_ADAPTER,
} from './model.constants';
import type { PredictionAdapter } from './prediction-adapter.interface';

/**
 * ModelModule — loads the trained model and exposes it as a PredictionAdapter.
 *
 * Usage:
 *   ModelModule.forRoot()  — once, in AppModule
 *
 * Exports (globally):
 *   - PREDICTION_ADAPTER: PredictionAdapter
 *   - MODEL_ARTIFACT: ModelArtifact (name/version for health reporting)
 *
 * The artifact is read synchronously while the module graph is built.
 * A missing or invalid artifact throws and aborts application startup.
 */
@Module({})
export class ModelModule {
  static forRoot(): DynamicModule {
    const artifactProvider = {
      provide: MODEL_ARTIFACT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService): ModelArtifact => {
        const logger = new Logger(ModelModule.name);
        const path = resolve(
          configService.get<string>('MODEL_PATH', DEFAULT_MODEL_PATH),
        );
        const artifact = loadModelArtifact(path);

        logger.log(
          `Loaded model "${artifact.name}" v${artifact.version} from ${path}`,
        );

        return artifact;
      },
    };

    const adapterProvider = {
      provide: PREDICTION_ADAPTER,
      inject: [MODEL_ARTIFACT],
      useFactory: (artifact: ModelArtifact): PredictionAdapter =>
        new LinearRegressionAdapter(artifact),
    };

    return {
      module: ModelModule,
      imports: [ConfigModule],
      providers: [artifactProvider, adapterProvider],
      exports: [MODEL_ARTIFACT, PREDICTION_ADAPTER],
      global: true,
    };
  }
}
