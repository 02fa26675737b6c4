import { SupportedTelegramCommand } from './telegram.interfaces';

export const SUPPORTED_COMMAND_MAP: Readonly<Record<string, SupportedTelegramCommand>> = {
  start: SupportedTelegramCommand.START,
  stop: SupportedTelegramCommand.STOP,
  threshold: SupportedTelegramCommand.THRESHOLD,
  thresholds: SupportedTelegramCommand.THRESHOLD,
  status: SupportedTelegramCommand.STATUS,
  dashboard: SupportedTelegramCommand.DASHBOARD,
  help: SupportedTelegramCommand.HELP,
};

export const THRESHOLD_USAGE: string =
  'Usage: /threshold &lt;network&gt; &lt;value&gt; [native|usd]';

export const HELP_LINES: readonly string[] = [
  '<b>Commands</b>',
  '/start - enable alerts for this chat',
  '/stop - disable alerts for this chat',
  '/threshold - show alert thresholds',
  '/threshold &lt;network&gt; &lt;value&gt; [native|usd] - set a threshold',
  '/status - monitor status and current prices',
  '/dashboard - recent transactions per network',
  '/help - this message',
];
