import { Logger } from '@nestjs/common';
import { Ctx, On, Update } from 'nestjs-telegraf';
import type { Context } from 'telegraf';
import type { Message } from 'telegraf/typings/core/types/typegram';

import { TelegramCommandsService } from './telegram-commands.service';
import { TelegramParserService } from './telegram-parser.service';
import type {
  CommandExecutionResult,
  ParsedMessageCommand,
  IncomingChatMessage,
  ReplyOptions,
} from './telegram.interfaces';
import { escapeHtml } from '../common/utils/html/escape-html.util';
import { SubscriberRegistryService } from '../subscribers/subscriber-registry.service';

const UNAUTHORIZED_REPLY: string = '⛔ This bot only accepts commands from its operator chat.';

@Update()
export class TelegramUpdate {
  private readonly logger: Logger = new Logger(TelegramUpdate.name);
  private readonly chatCommandQueue: Map<string, Promise<void>> = new Map<string, Promise<void>>();

  public constructor(
    private readonly telegramParserService: TelegramParserService,
    private readonly telegramCommandsService: TelegramCommandsService,
    private readonly subscriberRegistry: SubscriberRegistryService,
  ) {}

  @On('text')
  public async onText(@Ctx() ctx: Context): Promise<void> {
    const incoming: IncomingChatMessage | null = this.readIncomingMessage(ctx);

    if (incoming === null) {
      this.logger.debug(`Ignore update without chat text updateId=${ctx.update.update_id}`);
      return;
    }

    const parsedCommands: readonly ParsedMessageCommand[] =
      this.telegramParserService.parseMessageCommands(incoming.text);

    if (parsedCommands.length === 0) {
      this.logger.debug(
        `Ignore non-command text updateId=${incoming.updateId} chatId=${incoming.chatId}`,
      );
      return;
    }

    if (!this.subscriberRegistry.isAuthorized(incoming.chatId)) {
      this.logger.warn(`Unauthorized commands ignored chatId=${incoming.chatId}`);
      await this.replyWithLog(ctx, UNAUTHORIZED_REPLY, incoming);
      return;
    }

    this.logger.log(
      `Incoming commands count=${parsedCommands.length} updateId=${incoming.updateId} chatId=${incoming.chatId} messageId=${incoming.messageId}`,
    );

    const results: readonly CommandExecutionResult[] = await this.runSequentialForChat(
      incoming.chatId,
      async (): Promise<readonly CommandExecutionResult[]> =>
        this.executeParsedCommands(parsedCommands, incoming.chatId),
    );
    const failedCount: number = results.filter(
      (result: CommandExecutionResult): boolean => !result.ok,
    ).length;

    this.logger.log(
      `Commands processed chatId=${incoming.chatId} total=${results.length} failed=${failedCount}`,
    );
    await this.replyWithLog(ctx, this.formatExecutionResults(results), incoming);
  }

  // A failing command becomes its own error row; the rest of the batch still runs.
  private async executeParsedCommands(
    commands: readonly ParsedMessageCommand[],
    chatId: string,
  ): Promise<readonly CommandExecutionResult[]> {
    const results: CommandExecutionResult[] = [];

    for (const parsed of commands) {
      try {
        const message: string = await this.telegramCommandsService.execute(parsed, chatId);
        results.push({ ok: true, command: parsed.command, lineNumber: parsed.lineNumber, message });
      } catch (error: unknown) {
        const reason: string = error instanceof Error ? error.message : String(error);
        this.logger.warn(
          `Command failed chatId=${chatId} command=${parsed.command} reason=${reason}`,
        );
        results.push({ ok: false, command: parsed.command, lineNumber: parsed.lineNumber, reason });
      }
    }

    return results;
  }

  private formatExecutionResults(results: readonly CommandExecutionResult[]): string {
    const singleResult: CommandExecutionResult | undefined = results[0];

    if (results.length === 1 && singleResult !== undefined) {
      return this.formatResultBody(singleResult);
    }

    const rows: readonly string[] = results.map(
      (result: CommandExecutionResult, index: number): string =>
        `${index + 1}. Line ${result.lineNumber}:\n${this.formatResultBody(result)}`,
    );

    return [`Processed commands: ${results.length}`, ...rows].join('\n\n');
  }

  private formatResultBody(result: CommandExecutionResult): string {
    if (result.ok) {
      return result.message;
    }

    return `⚠️ <b>Error:</b> /${result.command} failed: ${escapeHtml(result.reason)}`;
  }

  private async runSequentialForChat<T>(chatId: string, task: () => Promise<T>): Promise<T> {
    const previousTask: Promise<void> = this.chatCommandQueue.get(chatId) ?? Promise.resolve();

    const taskPromise: Promise<T> = previousTask
      .catch((): void => undefined)
      .then(async (): Promise<T> => {
        this.logger.debug(`Command queue start chatId=${chatId}`);
        return task();
      });

    const queuePromise: Promise<void> = taskPromise
      .then((): void => undefined)
      .catch((): void => undefined)
      .finally((): void => {
        if (this.chatCommandQueue.get(chatId) === queuePromise) {
          this.chatCommandQueue.delete(chatId);
        }
        this.logger.debug(`Command queue finish chatId=${chatId}`);
      });

    this.chatCommandQueue.set(chatId, queuePromise);
    return taskPromise;
  }

  private readIncomingMessage(ctx: Context): IncomingChatMessage | null {
    const message = ctx.message;

    if (!message || !('text' in message) || ctx.chat === undefined) {
      return null;
    }

    return {
      updateId: ctx.update.update_id,
      chatId: String(ctx.chat.id),
      messageId: message.message_id,
      text: message.text,
    };
  }

  private async replyWithLog(
    ctx: Context,
    text: string,
    incoming: IncomingChatMessage,
  ): Promise<void> {
    const target: string = `updateId=${incoming.updateId} chatId=${incoming.chatId}`;
    this.logger.debug(`Reply start ${target} textLength=${text.length}`);

    try {
      const sentMessage: Message.TextMessage = await ctx.reply(text, this.buildReplyOptions());
      this.logger.log(`Reply success ${target} responseMessageId=${sentMessage.message_id}`);
    } catch (error: unknown) {
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      this.logger.error(`Reply failed ${target} reason=${errorMessage}`);
      throw error;
    }
  }

  private buildReplyOptions(): ReplyOptions {
    return {
      parse_mode: 'HTML',
      link_preview_options: {
        is_disabled: true,
      },
    };
  }
}
