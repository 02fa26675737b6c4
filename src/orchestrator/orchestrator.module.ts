import { Module } from '@nestjs/common';

import { PollOrchestratorService } from './poll-orchestrator.service';
import { AlertsModule } from '../alerts/alerts.module';
import { MonitoringModule } from '../monitoring/monitoring.module';
import { ObservabilityModule } from '../observability/observability.module';
import { SubscribersModule } from '../subscribers/subscribers.module';

@Module({
  imports: [MonitoringModule, SubscribersModule, AlertsModule, ObservabilityModule],
  providers: [PollOrchestratorService],
  exports: [PollOrchestratorService],
})
export class OrchestratorModule {}
