import { Module } from '@nestjs/common';

import { HealthController } from './health.controller';
import { HealthService } from './health.service';
import { DatabaseModule } from '../database/database.module';
import { ObservabilityModule } from '../observability/observability.module';
import { OrchestratorModule } from '../orchestrator/orchestrator.module';
import { SubscribersModule } from '../subscribers/subscribers.module';
import { TelegramModule } from '../telegram/telegram.module';

@Module({
  imports: [
    DatabaseModule,
    ObservabilityModule,
    OrchestratorModule,
    SubscribersModule,
    TelegramModule,
  ],
  controllers: [HealthController],
  providers: [HealthService],
})
export class HealthModule {}
