import { Module } from '@nestjs/common';

import { AlertMessageFormatter } from './alert-message.formatter';
import { NotificationDispatcherService } from './notification-dispatcher.service';
import { ObservabilityModule } from '../observability/observability.module';
import { TelegramModule } from '../telegram/telegram.module';

@Module({
  imports: [TelegramModule, ObservabilityModule],
  providers: [AlertMessageFormatter, NotificationDispatcherService],
  exports: [AlertMessageFormatter, NotificationDispatcherService],
})
export class AlertsModule {}
