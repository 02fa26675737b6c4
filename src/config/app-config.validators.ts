import { parseNetworkList, parseNetworkThresholds } from './app-config.parsers';
import type { ParsedEnv } from './app-config.schema';
import { ConfigurationMissingError } from '../core/errors/monitoring.errors';
import { NetworkKey } from '../core/networks/network-key.interfaces';
import type { INetworkThreshold } from '../core/transactions/transaction.interfaces';

export function requireBotToken(parsedEnv: ParsedEnv): string {
  if (!parsedEnv.BOT_TOKEN) {
    throw new ConfigurationMissingError('BOT_TOKEN is required');
  }

  return parsedEnv.BOT_TOKEN;
}

export function assertMonitoringConfig(parsedEnv: ParsedEnv): void {
  assertTelegramConfig(parsedEnv);
  assertPollingConfig(parsedEnv);
  assertDashboardConfig(parsedEnv);
  assertNetworkConfig(parsedEnv);
}

function assertTelegramConfig(parsedEnv: ParsedEnv): void {
  if (parsedEnv.ALERT_MODE === 'global' && !parsedEnv.TELEGRAM_CHAT_ID) {
    throw new ConfigurationMissingError('TELEGRAM_CHAT_ID is required when ALERT_MODE=global');
  }
}

function assertPollingConfig(parsedEnv: ParsedEnv): void {
  if (parsedEnv.MONITOR_FETCH_TIMEOUT_MS > parsedEnv.POLL_INTERVAL_SEC * 1000) {
    throw new Error('MONITOR_FETCH_TIMEOUT_MS must be <= POLL_INTERVAL_SEC * 1000');
  }

  // A batch larger than the dedup window would evict its own hashes and re-alert them.
  if (parsedEnv.SOURCE_FETCH_LIMIT > parsedEnv.DEDUP_CAPACITY) {
    throw new Error('SOURCE_FETCH_LIMIT must be <= DEDUP_CAPACITY');
  }
}

function assertDashboardConfig(parsedEnv: ParsedEnv): void {
  if (
    parsedEnv.DASHBOARD_ENABLED &&
    parsedEnv.DASHBOARD_INTERVAL_SEC < parsedEnv.POLL_INTERVAL_SEC
  ) {
    throw new Error('DASHBOARD_INTERVAL_SEC must be >= POLL_INTERVAL_SEC');
  }
}

function assertNetworkConfig(parsedEnv: ParsedEnv): void {
  const enabledNetworks: readonly NetworkKey[] = parseNetworkList(parsedEnv.ENABLED_NETWORKS);

  if (enabledNetworks.length === 0) {
    throw new ConfigurationMissingError('ENABLED_NETWORKS must name at least one network');
  }

  const thresholds: ReadonlyMap<NetworkKey, INetworkThreshold> = parseNetworkThresholds(
    parsedEnv.NETWORK_THRESHOLDS,
  );

  for (const networkKey of enabledNetworks) {
    if (!thresholds.has(networkKey)) {
      throw new ConfigurationMissingError(
        `NETWORK_THRESHOLDS has no entry for enabled network=${networkKey}`,
      );
    }
  }

  if (enabledNetworks.includes(NetworkKey.EVERSCALE) && !parsedEnv.EVERSCALE_GRAPHQL_URL) {
    throw new ConfigurationMissingError(
      'EVERSCALE_GRAPHQL_URL is required when ENABLED_NETWORKS includes everscale',
    );
  }
}
