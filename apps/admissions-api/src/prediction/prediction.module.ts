import { Module } from '@nestjs/common';
import { AuthModule } from '../auth';
import { PredictionController } from './prediction.controller';
import { PredictionService } from './prediction.service';

/**
 * PredictionModule — the protected /predict endpoint.
 *
 * PREDICTION_ADAPTER comes from the global ModelModule; AuthModule supplies
 * AuthService for JwtAuthGuard.
 */
@Module({
  imports: [AuthModule],
  controllers: [PredictionController],
  providers: [PredictionService],
})
export class PredictionModule {}
