import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Thrown when the prediction adapter rejects, times out, or returns a
 * non-finite number. No fallback value is ever substituted.
 * Maps to HTTP 500 Internal Server Error.
 */
export class PredictionFailedException extends HttpException {
  constructor(cause: unknown) {
    super(
      {
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        error: 'Internal Server Error',
        message: 'Prediction failed. Please try again later.',
      },
      HttpStatus.INTERNAL_SERVER_ERROR,
      { cause },
    );
  }
}
