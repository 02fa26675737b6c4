import { Injectable } from '@nestjs/common';

import type { IDashboardSection } from './alert.interfaces';
import { escapeHtml } from '../common/utils/html/escape-html.util';
import { AppConfigService } from '../config/app-config.service';
import {
  getNetworkDefinition,
  type INetworkDefinition,
} from '../core/networks/network-definitions';
import type { NetworkKey } from '../core/networks/network-key.interfaces';
import {
  type INetworkThreshold,
  type ITransactionRecord,
  ThresholdUnit,
} from '../core/transactions/transaction.interfaces';

const SHORTEN_MIN_LENGTH = 16;
const ADDRESS_EDGE_LENGTH = 8;
const HASH_EDGE_LENGTH = 12;

const usdFormatter: Intl.NumberFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});
const nativeFormatter: Intl.NumberFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 4,
  maximumFractionDigits: 4,
});
const thresholdFormatter: Intl.NumberFormat = new Intl.NumberFormat('en-US', {
  maximumFractionDigits: 4,
});

const shorten = (value: string, edgeLength: number): string => {
  if (value.length <= SHORTEN_MIN_LENGTH) {
    return value;
  }

  return `${value.slice(0, edgeLength)}...${value.slice(-edgeLength)}`;
};

// Seconds since epoch -> "YYYY-MM-DD HH:MM:SS UTC".
const formatUtcTimestamp = (epochSeconds: number): string =>
  `${new Date(epochSeconds * 1000).toISOString().slice(0, 19).replace('T', ' ')} UTC`;

@Injectable()
export class AlertMessageFormatter {
  public constructor(private readonly appConfigService: AppConfigService) {}

  public formatTransaction(transaction: ITransactionRecord): string {
    const definition: INetworkDefinition = getNetworkDefinition(transaction.network);
    const explorerLink: string = this.buildExplorerLink(definition, transaction.txHash);

    return [
      '🚨 <b>Large Transaction Detected!</b>',
      '',
      `💰 <b>Amount:</b> ${this.formatUsdAmount(transaction)}`,
      `   (${nativeFormatter.format(transaction.amountNative)} ${definition.tokenSymbol})`,
      '',
      `🌐 <b>Network:</b> ${definition.displayName}`,
      '',
      `📤 <b>From:</b> ${this.formatCode(transaction.sender, ADDRESS_EDGE_LENGTH)}`,
      `📥 <b>To:</b> ${this.formatCode(transaction.receiver, ADDRESS_EDGE_LENGTH)}`,
      '',
      `🔗 <b>Transaction:</b> ${this.formatCode(transaction.txHash, HASH_EDGE_LENGTH)}`,
      '',
      `🕒 <b>Time:</b> ${formatUtcTimestamp(transaction.timestamp)}`,
      '',
      `🔍 <a href="${explorerLink}">View on Explorer</a>`,
    ].join('\n');
  }

  public formatDashboard(sections: readonly IDashboardSection[], generatedAt: Date): string {
    const rows: string[] = ['📊 <b>Transaction Dashboard</b>', ''];

    for (const section of sections) {
      const definition: INetworkDefinition = getNetworkDefinition(section.networkKey);
      rows.push(`<b>${definition.displayName}</b>`);

      if (section.transactions.length === 0) {
        rows.push('  No recent transactions');
      }

      for (const transaction of section.transactions) {
        const explorerLink: string = this.buildExplorerLink(definition, transaction.txHash);
        const amountLabel: string = `${nativeFormatter.format(
          transaction.amountNative,
        )} ${definition.tokenSymbol}`;
        rows.push(`  • <a href="${explorerLink}">${amountLabel}</a>`);
      }

      rows.push('');
    }

    rows.push(`🕒 Updated: ${generatedAt.toISOString().slice(11, 19)} UTC`);

    return rows.join('\n');
  }

  public formatStartup(): string {
    const networkNames: string = this.appConfigService.enabledNetworks
      .map((networkKey: NetworkKey): string => getNetworkDefinition(networkKey).displayName)
      .join(', ');
    const thresholdRows: readonly string[] = this.appConfigService.enabledNetworks.map(
      (networkKey: NetworkKey): string => {
        const threshold: INetworkThreshold | undefined =
          this.appConfigService.networkThresholds.get(networkKey);
        const thresholdLabel: string =
          threshold === undefined ? 'n/a' : this.formatThreshold(networkKey, threshold);

        return `  • ${getNetworkDefinition(networkKey).displayName}: ≥ ${thresholdLabel}`;
      },
    );

    return [
      '🤖 <b>Transaction Monitor Started</b>',
      '',
      `Monitoring networks: ${networkNames}`,
      'Alert thresholds:',
      ...thresholdRows,
      `Poll interval: ${String(this.appConfigService.pollIntervalSec)}s`,
      `Alert mode: ${this.appConfigService.alertMode}`,
      '',
      '✅ Monitoring is active',
    ].join('\n');
  }

  public formatError(errorMessage: string): string {
    return `⚠️ <b>Error:</b> ${escapeHtml(errorMessage)}`;
  }

  public formatThreshold(networkKey: NetworkKey, threshold: INetworkThreshold): string {
    if (threshold.unit === ThresholdUnit.USD) {
      return `$${thresholdFormatter.format(threshold.value)}`;
    }

    const tokenSymbol: string = getNetworkDefinition(networkKey).tokenSymbol;

    return `${thresholdFormatter.format(threshold.value)} ${tokenSymbol}`;
  }

  private formatUsdAmount(transaction: ITransactionRecord): string {
    if (transaction.amountUsd === null) {
      return 'USD n/a';
    }

    const usdLabel: string = `$${usdFormatter.format(transaction.amountUsd)}`;

    return transaction.priceVerified ? usdLabel : `~${usdLabel} (unverified price)`;
  }

  private formatCode(value: string, edgeLength: number): string {
    return `<code>${escapeHtml(shorten(value, edgeLength))}</code>`;
  }

  private buildExplorerLink(definition: INetworkDefinition, txHash: string): string {
    return `${definition.explorerTxBaseUrl}${encodeURIComponent(txHash)}`;
  }
}
