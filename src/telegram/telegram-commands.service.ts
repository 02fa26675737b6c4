import { Inject, Injectable, Logger } from '@nestjs/common';

import { ThresholdArgsError, type ThresholdArgsParseResult } from './telegram-parser.interfaces';
import { TelegramParserService } from './telegram-parser.service';
import { HELP_LINES, THRESHOLD_USAGE } from './telegram.constants';
import { type ParsedMessageCommand, SupportedTelegramCommand } from './telegram.interfaces';
import { AlertMessageFormatter } from '../alerts/alert-message.formatter';
import { escapeHtml } from '../common/utils/html/escape-html.util';
import { AppConfigService } from '../config/app-config.service';
import { getNetworkDefinition } from '../core/networks/network-definitions';
import { ALL_NETWORK_KEYS, type NetworkKey } from '../core/networks/network-key.interfaces';
import { NETWORK_MONITORS } from '../core/ports/monitors/network-monitor-port.tokens';
import type { INetworkMonitor } from '../core/ports/monitors/network-monitor.interfaces';
import type { IPriceQuote } from '../core/ports/pricing/price-source.interfaces';
import type { ISubscriberRecord } from '../core/ports/subscribers/subscriber-store.interfaces';
import type { INetworkThreshold } from '../core/transactions/transaction.interfaces';
import { DashboardReporterService } from '../dashboard/dashboard-reporter.service';
import type { NetworkRuntimeEntry, RuntimeTelemetry } from '../runtime/runtime-status.interfaces';
import { RuntimeStatusService } from '../runtime/runtime-status.service';
import { SubscriberRegistryService } from '../subscribers/subscriber-registry.service';

const priceFormatter: Intl.NumberFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 6,
});

/**
 * Executes parsed chat commands for one chat and returns the HTML reply text.
 * Chat authorization and per-chat ordering are handled by {@link TelegramUpdate}.
 */
@Injectable()
export class TelegramCommandsService {
  private readonly logger: Logger = new Logger(TelegramCommandsService.name);

  public constructor(
    private readonly subscriberRegistry: SubscriberRegistryService,
    private readonly runtimeStatusService: RuntimeStatusService,
    private readonly dashboardReporter: DashboardReporterService,
    private readonly alertMessageFormatter: AlertMessageFormatter,
    private readonly telegramParserService: TelegramParserService,
    private readonly appConfigService: AppConfigService,
    @Inject(NETWORK_MONITORS) private readonly monitors: readonly INetworkMonitor[],
  ) {}

  public async execute(command: ParsedMessageCommand, chatId: string): Promise<string> {
    this.logger.debug(
      `command start chatId=${chatId} command=${command.command} args=${String(command.args.length)}`,
    );

    switch (command.command) {
      case SupportedTelegramCommand.START:
        return this.handleStart(chatId);
      case SupportedTelegramCommand.STOP:
        return this.handleStop(chatId);
      case SupportedTelegramCommand.THRESHOLD:
        return command.args.length === 0
          ? this.showThresholds(chatId)
          : this.handleSetThreshold(chatId, command.args);
      case SupportedTelegramCommand.STATUS:
        return this.handleStatus(chatId);
      case SupportedTelegramCommand.DASHBOARD:
        return this.dashboardReporter.buildReport();
      case SupportedTelegramCommand.HELP:
        return HELP_LINES.join('\n');
    }
  }

  private async handleStart(chatId: string): Promise<string> {
    await this.subscriberRegistry.enable(chatId);

    return ['✅ Alerts enabled for this chat.', 'Send /help to see the commands.'].join('\n');
  }

  private async handleStop(chatId: string): Promise<string> {
    const record: ISubscriberRecord | null = await this.subscriberRegistry.disable(chatId);

    if (record === null) {
      return 'Alerts are not enabled for this chat.';
    }

    return '🔕 Alerts disabled. Send /start to resume.';
  }

  private showThresholds(chatId: string): string {
    const subscriber: ISubscriberRecord | null = this.subscriberRegistry.getSubscriber(chatId);
    const rows: string[] = ['<b>Alert thresholds</b>'];

    for (const networkKey of this.appConfigService.enabledNetworks) {
      const displayName: string = getNetworkDefinition(networkKey).displayName;
      const threshold: INetworkThreshold | null = this.subscriberRegistry.resolveThreshold(
        subscriber,
        networkKey,
      );

      if (threshold === null) {
        rows.push(`• ${displayName}: not set`);
        continue;
      }

      const customSuffix: string =
        subscriber?.thresholds[networkKey] === undefined ? '' : ' (custom)';
      rows.push(
        `• ${displayName}: ≥ ${this.alertMessageFormatter.formatThreshold(networkKey, threshold)}${customSuffix}`,
      );
    }

    return rows.join('\n');
  }

  private async handleSetThreshold(chatId: string, args: readonly string[]): Promise<string> {
    const parsed: ThresholdArgsParseResult = this.telegramParserService.parseThresholdArgs(args);

    if (!parsed.ok) {
      return this.describeThresholdError(parsed.error, parsed.rawValue);
    }

    if (!this.appConfigService.enabledNetworks.includes(parsed.networkKey)) {
      return `${getNetworkDefinition(parsed.networkKey).displayName} is not monitored.`;
    }

    await this.subscriberRegistry.setThreshold(chatId, parsed.networkKey, parsed.threshold);
    this.logger.log(
      `threshold updated chatId=${chatId} network=${parsed.networkKey} unit=${parsed.threshold.unit} value=${String(parsed.threshold.value)}`,
    );

    return `✅ ${getNetworkDefinition(parsed.networkKey).displayName} threshold set to ≥ ${this.alertMessageFormatter.formatThreshold(parsed.networkKey, parsed.threshold)}`;
  }

  private describeThresholdError(error: ThresholdArgsError, rawValue: string | null): string {
    switch (error) {
      case ThresholdArgsError.USAGE:
        return THRESHOLD_USAGE;
      case ThresholdArgsError.UNKNOWN_NETWORK:
        return [
          `Unknown network "${escapeHtml(rawValue ?? '')}".`,
          `Available: ${ALL_NETWORK_KEYS.join(', ')}`,
        ].join('\n');
      case ThresholdArgsError.INVALID_VALUE:
        return [`Invalid threshold "${escapeHtml(rawValue ?? '')}".`, THRESHOLD_USAGE].join('\n');
    }
  }

  private async handleStatus(chatId: string): Promise<string> {
    const telemetry: RuntimeTelemetry = this.runtimeStatusService.getTelemetry();
    const subscriber: ISubscriberRecord | null = this.subscriberRegistry.getSubscriber(chatId);
    const quotes: readonly (IPriceQuote | null)[] = await Promise.all(
      this.monitors.map(
        async (monitor: INetworkMonitor): Promise<IPriceQuote | null> =>
          this.loadQuote(monitor),
      ),
    );
    const rows: string[] = [
      '📈 <b>Monitor status</b>',
      `Alerts for this chat: ${subscriber?.enabled === true ? 'enabled' : 'disabled'}`,
      `Completed cycles: ${String(telemetry.cycle.completedCycles)}`,
      `Last cycle: ${telemetry.cycle.lastCycleStartedIso ?? 'n/a'}`,
    ];

    if (telemetry.cycle.lastCycleError !== null) {
      rows.push(`Last cycle error: ${escapeHtml(telemetry.cycle.lastCycleError)}`);
    }

    this.monitors.forEach((monitor: INetworkMonitor, index: number): void => {
      rows.push('', ...this.formatNetworkStatus(monitor.networkKey, quotes[index] ?? null));
    });

    return rows.join('\n');
  }

  private formatNetworkStatus(networkKey: NetworkKey, quote: IPriceQuote | null): string[] {
    const entry: NetworkRuntimeEntry | null = this.runtimeStatusService.getNetworkEntry(networkKey);
    const rows: string[] = [
      `<b>${getNetworkDefinition(networkKey).displayName}</b>: ${entry?.state ?? 'pending'}`,
      `  Last success: ${entry?.lastSuccessIso ?? 'n/a'}`,
      `  New transactions: ${String(entry?.lastNewTransactions ?? 0)}`,
      `  Price: ${this.formatQuote(quote)}`,
    ];

    if (entry?.lastError !== null && entry?.lastError !== undefined) {
      rows.push(`  Error: ${escapeHtml(entry.lastError)}`);
    }

    return rows;
  }

  private formatQuote(quote: IPriceQuote | null): string {
    if (quote === null) {
      return 'n/a';
    }

    const flags: string[] = [];

    if (!quote.verified) {
      flags.push('fallback');
    }

    if (quote.stale) {
      flags.push('stale');
    }

    const priceLabel: string = `$${priceFormatter.format(quote.usdPrice)}`;

    return flags.length === 0 ? priceLabel : `${priceLabel} (${flags.join(', ')})`;
  }

  private async loadQuote(monitor: INetworkMonitor): Promise<IPriceQuote | null> {
    try {
      return await monitor.getCurrentPrice();
    } catch (error: unknown) {
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      this.logger.warn(`status price failed network=${monitor.networkKey} reason=${errorMessage}`);
      return null;
    }
  }
}
