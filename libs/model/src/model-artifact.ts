import { readFileSync } from 'fs';
import { plainToInstance, Type } from 'class-transformer';
import {
  ArrayMaxSize,
  ArrayMinSize,
  ArrayUnique,
  IsArray,
  IsIn,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsString,
  NotEquals,
  ValidateNested,
  validateSync,
  ValidationError,
} from 'class-validator';
import { FEATURE_NAMES, FeatureName } from './feature-record.interface';
import { ModelArtifactException } from './model.exceptions';

const FEATURE_COUNT = FEATURE_NAMES.length;

const FINITE = { allowNaN: false, allowInfinity: false } as const;

/**
 * Standard-scaling parameters fitted on the training set.
 * Each feature is transformed as `(x - mean[i]) / scale[i]`.
 */
export class ScalerParams {
  @IsArray()
  @ArrayMinSize(FEATURE_COUNT)
  @ArrayMaxSize(FEATURE_COUNT)
  @IsNumber(FINITE, { each: true })
  mean!: number[];

  @IsArray()
  @ArrayMinSize(FEATURE_COUNT)
  @ArrayMaxSize(FEATURE_COUNT)
  @IsNumber(FINITE, { each: true })
  @NotEquals(0, { each: true, message: 'scale entries must be non-zero' })
  scale!: number[];
}

/**
 * Serialized linear regression model.
 *
 * `features` lists every FeatureRecord field exactly once and fixes the
 * order of `coefficients` and of the scaler arrays.
 */
export class ModelArtifact {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsString()
  @IsNotEmpty()
  version!: string;

  @IsOptional()
  @IsString()
  description?: string;

  @IsArray()
  @ArrayMinSize(FEATURE_COUNT)
  @ArrayMaxSize(FEATURE_COUNT)
  @ArrayUnique()
  @IsIn([...FEATURE_NAMES], { each: true })
  features!: FeatureName[];

  @IsArray()
  @ArrayMinSize(FEATURE_COUNT)
  @ArrayMaxSize(FEATURE_COUNT)
  @IsNumber(FINITE, { each: true })
  coefficients!: number[];

  @IsNumber(FINITE)
  intercept!: number;

  @IsOptional()
  @ValidateNested()
  @Type(() => ScalerParams)
  scaler?: ScalerParams;
}

/**
 * Validate an already-parsed artifact document.
 *
 * @throws ModelArtifactException listing every violated constraint
 */
export function parseModelArtifact(
  document: unknown,
  source: string,
): ModelArtifact {
  if (typeof document !== 'object' || document === null || Array.isArray(document)) {
    throw new ModelArtifactException(source, ['expected a JSON object']);
  }

  const artifact = plainToInstance(ModelArtifact, document);
  const errors = validateSync(artifact, { forbidUnknownValues: true });

  if (errors.length > 0) {
    throw new ModelArtifactException(source, flattenErrors(errors));
  }

  return artifact;
}

/**
 * Read and validate the artifact stored at `path`.
 *
 * @throws ModelArtifactException if the file is unreadable, not JSON, or invalid
 */
export function loadModelArtifact(path: string): ModelArtifact {
  let document: unknown;

  try {
    document = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ModelArtifactException(path, [reason]);
  }

  return parseModelArtifact(document, path);
}

function flattenErrors(errors: ValidationError[], prefix = ''): string[] {
  return errors.flatMap((error) => {
    const path = `${prefix}${error.property}`;
    const own = Object.values(error.constraints ?? {}).map(
      (message) => `${path}: ${message}`,
    );
    const nested = flattenErrors(error.children ?? [], `${path}.`);
    return [...own, ...nested];
  });
}
