import { Injectable, Logger } from '@nestjs/common';
import { InjectBot } from 'nestjs-telegraf';
import type { Telegraf } from 'telegraf';

import type { INotificationSink } from '../core/ports/notifications/notification-sink.interfaces';

export type TelegramSendTextOptions = Parameters<Telegraf['telegram']['sendMessage']>[2];

const DEFAULT_SEND_OPTIONS: TelegramSendTextOptions = {
  parse_mode: 'HTML',
  link_preview_options: { is_disabled: true },
};

@Injectable()
export class TelegramSenderService implements INotificationSink {
  private readonly logger: Logger = new Logger(TelegramSenderService.name);

  public constructor(@InjectBot() private readonly bot: Telegraf) {}

  public async sendMessage(destinationId: string, message: string): Promise<void> {
    this.logger.debug(
      `sendMessage start chatId=${destinationId} textLength=${message.length.toString()}`,
    );

    await this.bot.telegram.sendMessage(destinationId, message, DEFAULT_SEND_OPTIONS);
    this.logger.debug(`sendMessage success chatId=${destinationId}`);
  }

  public async getBotUsername(): Promise<string> {
    const botInfo: Awaited<ReturnType<Telegraf['telegram']['getMe']>> =
      await this.bot.telegram.getMe();

    return botInfo.username;
  }
}
