import type { Context } from 'telegraf';

export enum SupportedTelegramCommand {
  START = 'start',
  STOP = 'stop',
  THRESHOLD = 'threshold',
  STATUS = 'status',
  DASHBOARD = 'dashboard',
  HELP = 'help',
}

export type ParsedMessageCommand = {
  readonly command: SupportedTelegramCommand;
  readonly args: readonly string[];
  readonly lineNumber: number;
};

export type ReplyOptions = NonNullable<Parameters<Context['reply']>[1]>;

export type CommandExecutionResult =
  | {
      readonly ok: true;
      readonly command: SupportedTelegramCommand;
      readonly lineNumber: number;
      readonly message: string;
    }
  | {
      readonly ok: false;
      readonly command: SupportedTelegramCommand;
      readonly lineNumber: number;
      readonly reason: string;
    };

// A text message that arrived in a chat; updates without text or chat never get this far.
export type IncomingChatMessage = {
  readonly updateId: number;
  readonly chatId: string;
  readonly messageId: number;
  readonly text: string;
};
