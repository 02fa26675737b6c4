import { Module } from '@nestjs/common';

import { MetricsCollectorService } from './metrics-collector.service';
import { MetricsController } from './metrics.controller';
import { MetricsService } from './metrics.service';
import { RuntimeStatusService } from '../runtime/runtime-status.service';

@Module({
  controllers: [MetricsController],
  providers: [MetricsService, RuntimeStatusService, MetricsCollectorService],
  exports: [MetricsService, RuntimeStatusService],
})
export class ObservabilityModule {}
