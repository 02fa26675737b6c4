import { Module } from '@nestjs/common';

import { TelegramCommandsService } from './telegram-commands.service';
import { TelegramParserService } from './telegram-parser.service';
import { TelegramUpdate } from './telegram.update';
import { AlertsModule } from '../alerts/alerts.module';
import { DashboardModule } from '../dashboard/dashboard.module';
import { MonitoringModule } from '../monitoring/monitoring.module';
import { ObservabilityModule } from '../observability/observability.module';
import { SubscribersModule } from '../subscribers/subscribers.module';

@Module({
  imports: [
    SubscribersModule,
    ObservabilityModule,
    DashboardModule,
    MonitoringModule,
    AlertsModule,
  ],
  providers: [TelegramParserService, TelegramCommandsService, TelegramUpdate],
})
export class TelegramCommandsModule {}
