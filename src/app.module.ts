import { Module } from '@nestjs/common';

import { AlertsModule } from './alerts/alerts.module';
import { ConfigModule } from './config/config.module';
import { DashboardModule } from './dashboard/dashboard.module';
import { DatabaseModule } from './database/database.module';
import { HealthModule } from './health/health.module';
import { MonitoringModule } from './monitoring/monitoring.module';
import { ObservabilityModule } from './observability/observability.module';
import { OrchestratorModule } from './orchestrator/orchestrator.module';
import { RateLimitingModule } from './rate-limiting/rate-limiting.module';
import { SubscribersModule } from './subscribers/subscribers.module';
import { TelegramCommandsModule } from './telegram/telegram-commands.module';
import { TelegramModule } from './telegram/telegram.module';

@Module({
  imports: [
    ConfigModule,
    DatabaseModule,
    ObservabilityModule,
    RateLimitingModule,
    SubscribersModule,
    MonitoringModule,
    TelegramModule,
    AlertsModule,
    OrchestratorModule,
    DashboardModule,
    TelegramCommandsModule,
    HealthModule,
  ],
})
export class AppModule {}
