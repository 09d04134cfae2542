import { IsIn, IsInt, IsNumber, Max, Min } from 'class-validator';
import type { FeatureRecord } from '@admissions/model';

const AT_LEAST = { message: '$property must be at least $constraint1' };
const AT_MOST = { message: '$property must be at most $constraint1' };
const FINITE = { allowNaN: false, allowInfinity: false } as const;

/**
 * Request body for POST /predict.
 *
 * Validated by the global ValidationPipe before the handler runs; a bound
 * violation is reported with the field name and the bound, e.g.
 * "GRE_Score must be at most 340".
 */
export class FeatureRecordDto implements FeatureRecord {
  @IsInt()
  @Min(0, AT_LEAST)
  @Max(340, AT_MOST)
  GRE_Score!: number;

  @IsInt()
  @Min(0, AT_LEAST)
  @Max(120, AT_MOST)
  TOEFL_Score!: number;

  @IsInt()
  @Min(1, AT_LEAST)
  @Max(5, AT_MOST)
  University_Rating!: number;

  @IsNumber(FINITE)
  @Min(1, AT_LEAST)
  @Max(5, AT_MOST)
  SOP!: number;

  @IsNumber(FINITE)
  @Min(1, AT_LEAST)
  @Max(5, AT_MOST)
  LOR!: number;

  @IsNumber(FINITE)
  @Min(0, AT_LEAST)
  @Max(10, AT_MOST)
  CGPA!: number;

  /** 0 = no research experience, 1 = research experience */
  @IsIn([0, 1], { message: '$property must be 0 or 1' })
  Research!: number;
}
