import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  catchError,
  defer,
  lastValueFrom,
  timeout,
  TimeoutError,
} from 'rxjs';
import {
  FeatureRecord,
  PREDICTION_ADAPTER,
  PredictionAdapter,
} from '@admissions/model';
import { readPositiveInteger } from '../config/config.utils';
import { PredictionFailedException } from './exceptions/prediction.exceptions';

/** Default upper bound on one adapter call (in milliseconds) */
const DEFAULT_PREDICTION_TIMEOUT_MS = 10_000;

export interface PredictionResult {
  /** Within [0, 1] */
  chanceOfAdmit: number;
}

function clampUnit(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function describeError(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}

/**
 * PredictionService — runs a validated FeatureRecord through the model.
 *
 * The adapter is trusted but not assumed bounded: finite results are
 * clamped into [0, 1]; rejections, timeouts and non-finite results become
 * PredictionFailedException.
 */
@Injectable()
export class PredictionService {
  private readonly logger = new Logger(PredictionService.name);
  private readonly timeoutMs: number;

  constructor(
    @Inject(PREDICTION_ADAPTER)
    private readonly adapter: PredictionAdapter,
    configService: ConfigService,
  ) {
    this.timeoutMs = readPositiveInteger(
      configService,
      'PREDICTION_TIMEOUT_MS',
      DEFAULT_PREDICTION_TIMEOUT_MS,
    );
  }

  /**
   * The adapter gets its own signal, aborted when the caller's signal fires
   * or when the call times out.
   *
   * @param signal aborts the adapter call, e.g. when the client disconnects
   * @throws PredictionFailedException
   */
  async predict(
    record: FeatureRecord,
    signal?: AbortSignal,
  ): Promise<PredictionResult> {
    const call = new AbortController();
    const forwardAbort = () => call.abort(signal?.reason);
    if (signal?.aborted) {
      forwardAbort();
    } else {
      signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    let raw: number;
    try {
      raw = await lastValueFrom(
        defer(() => this.adapter.run(record, call.signal)).pipe(
          timeout(this.timeoutMs),
          catchError((error: unknown) => {
            if (signal?.aborted) {
              this.logger.debug('Prediction abandoned: client disconnected');
            } else {
              this.logger.error(`Prediction failed: ${describeError(error)}`);
            }
            if (error instanceof TimeoutError) {
              call.abort(error);
            }
            throw new PredictionFailedException(error);
          }),
        ),
      );
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
    }

    if (!Number.isFinite(raw)) {
      this.logger.error(`Prediction failed: model returned ${raw}`);
      throw new PredictionFailedException(
        new Error(`Model returned a non-finite value: ${raw}`),
      );
    }

    return { chanceOfAdmit: clampUnit(raw) };
  }
}
