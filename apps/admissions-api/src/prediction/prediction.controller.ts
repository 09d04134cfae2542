import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Logger,
  Post,
  Res,
  UseGuards,
} from '@nestjs/common';
import type { Response } from 'express';
import { CurrentUser, JwtAuthGuard, RequestUser } from '../auth';
import { FeatureRecordDto } from './dto/feature-record.dto';
import { PredictionResponseDto } from './dto/prediction-response.dto';
import { PredictionService } from './prediction.service';

/**
 * REST controller for admission predictions.
 *
 * Routes:
 *   POST /predict — predict the chance of admission for one applicant
 *
 * Requires a valid access token (Authorization: Bearer <token>).
 */
@Controller()
export class PredictionController {
  private readonly logger = new Logger(PredictionController.name);

  constructor(private readonly predictionService: PredictionService) {}

  /**
   * Flow:
   *   1. JwtAuthGuard authorizes the bearer token
   *   2. ValidationPipe checks every field against its bounds
   *   3. PredictionService runs the model and clamps the result
   *
   * Error responses:
   *   401 — Missing, malformed, invalid or expired token
   *   422 — Missing field, unknown field, or value out of bounds
   *   500 — Model failure
   */
  @Post('predict')
  @UseGuards(JwtAuthGuard)
  @HttpCode(HttpStatus.OK)
  async predict(
    @Body() dto: FeatureRecordDto,
    @CurrentUser() user: RequestUser,
    @Res({ passthrough: true }) res: Response,
  ): Promise<PredictionResponseDto> {
    // 'close' also fires after a normal response; only abort if unfinished
    const abortController = new AbortController();
    res.once('close', () => {
      if (!res.writableFinished) {
        abortController.abort();
      }
    });

    this.logger.debug(`Prediction requested by ${user.username}`);

    const result = await this.predictionService.predict(
      dto,
      abortController.signal,
    );

    return PredictionResponseDto.fromResult(result);
  }
}
