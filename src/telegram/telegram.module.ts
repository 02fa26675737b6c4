import { Module } from '@nestjs/common';
import { TelegrafModule } from 'nestjs-telegraf';
import type { TelegrafModuleOptions } from 'nestjs-telegraf/dist/interfaces/telegraf-options.interface';

import { TelegramSenderService } from './telegram-sender.service';
import { AppConfigService } from '../config/app-config.service';
import { NOTIFICATION_SINK } from '../core/ports/notifications/notification-sink-port.tokens';

const createTelegrafOptions = (appConfigService: AppConfigService): TelegrafModuleOptions => ({
  token: appConfigService.botToken,
  // Tests build the app without polling Telegram.
  launchOptions: appConfigService.nodeEnv === 'test' ? false : {},
});

@Module({
  imports: [
    TelegrafModule.forRootAsync({
      inject: [AppConfigService],
      useFactory: createTelegrafOptions,
    }),
  ],
  providers: [
    TelegramSenderService,
    {
      provide: NOTIFICATION_SINK,
      useExisting: TelegramSenderService,
    },
  ],
  exports: [NOTIFICATION_SINK, TelegramSenderService],
})
export class TelegramModule {}
