import type { PredictionResult } from '../prediction.service';

/**
 * Response body for POST /predict (HTTP 200).
 */
export class PredictionResponseDto {
  /** Predicted chance of admission, always within [0, 1] */
  chance_of_admit: number;

  private constructor(chanceOfAdmit: number) {
    this.chance_of_admit = chanceOfAdmit;
  }

  static fromResult(result: PredictionResult): PredictionResponseDto {
    return new PredictionResponseDto(result.chanceOfAdmit);
  }
}
