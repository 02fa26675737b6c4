import {
  parseNetworkList,
  parseNetworkThresholds,
  parseSystemAddresses,
} from './app-config.parsers';
import type { ParsedEnv } from './app-config.schema';
import { AlertMode, type AppConfig } from './app-config.types';
import { UnpricedUsdPolicy } from '../core/transactions/transaction.interfaces';

export const mapAppConfig = (parsedEnv: ParsedEnv, botToken: string): AppConfig => ({
  ...mapCoreConfig(parsedEnv, botToken),
  ...mapMonitoringConfig(parsedEnv),
  ...mapSourceConfig(parsedEnv),
  ...mapDeliveryConfig(parsedEnv),
});

const mapCoreConfig = (
  parsedEnv: ParsedEnv,
  botToken: string,
): Pick<
  AppConfig,
  | 'appVersion'
  | 'nodeEnv'
  | 'port'
  | 'logLevel'
  | 'metricsEnabled'
  | 'botToken'
  | 'telegramChatId'
  | 'alertMode'
  | 'databaseUrl'
> => ({
  appVersion: parsedEnv.APP_VERSION,
  nodeEnv: parsedEnv.NODE_ENV,
  port: parsedEnv.PORT,
  logLevel: parsedEnv.LOG_LEVEL,
  metricsEnabled: parsedEnv.METRICS_ENABLED,
  botToken,
  telegramChatId: parsedEnv.TELEGRAM_CHAT_ID ?? null,
  alertMode:
    parsedEnv.ALERT_MODE === 'per_subscriber' ? AlertMode.PER_SUBSCRIBER : AlertMode.GLOBAL,
  databaseUrl: parsedEnv.DATABASE_URL ?? null,
});

const mapMonitoringConfig = (
  parsedEnv: ParsedEnv,
): Pick<
  AppConfig,
  | 'pollIntervalSec'
  | 'monitorFetchTimeoutMs'
  | 'enabledNetworks'
  | 'networkThresholds'
  | 'usdUnpricedPolicy'
  | 'extraSystemAddresses'
  | 'sourceFetchLimit'
  | 'dedupCapacity'
  | 'priceCacheTtlSec'
  | 'humanodeFallbackUsdPrice'
> => ({
  pollIntervalSec: parsedEnv.POLL_INTERVAL_SEC,
  monitorFetchTimeoutMs: parsedEnv.MONITOR_FETCH_TIMEOUT_MS,
  enabledNetworks: parseNetworkList(parsedEnv.ENABLED_NETWORKS),
  networkThresholds: parseNetworkThresholds(parsedEnv.NETWORK_THRESHOLDS),
  usdUnpricedPolicy:
    parsedEnv.USD_UNPRICED_POLICY === 'pass' ? UnpricedUsdPolicy.PASS : UnpricedUsdPolicy.SUPPRESS,
  extraSystemAddresses: parseSystemAddresses(parsedEnv.SYSTEM_ADDRESSES),
  sourceFetchLimit: parsedEnv.SOURCE_FETCH_LIMIT,
  dedupCapacity: parsedEnv.DEDUP_CAPACITY,
  priceCacheTtlSec: parsedEnv.PRICE_CACHE_TTL_SEC,
  humanodeFallbackUsdPrice: parsedEnv.HUMANODE_FALLBACK_USD_PRICE,
});

const mapSourceConfig = (
  parsedEnv: ParsedEnv,
): Pick<
  AppConfig,
  | 'coingeckoApiBaseUrl'
  | 'coingeckoTimeoutMs'
  | 'toncenterApiBaseUrl'
  | 'toncenterApiKey'
  | 'everscaleGraphqlUrl'
  | 'venomGraphqlUrl'
  | 'subscanApiBaseUrl'
  | 'subscanApiKey'
  | 'rateLimitCoingeckoMinTimeMs'
  | 'rateLimitExplorerMinTimeMs'
> => ({
  coingeckoApiBaseUrl: parsedEnv.COINGECKO_API_BASE_URL,
  coingeckoTimeoutMs: parsedEnv.COINGECKO_TIMEOUT_MS,
  toncenterApiBaseUrl: parsedEnv.TONCENTER_API_BASE_URL,
  toncenterApiKey: parsedEnv.TONCENTER_API_KEY ?? null,
  everscaleGraphqlUrl: parsedEnv.EVERSCALE_GRAPHQL_URL ?? null,
  venomGraphqlUrl: parsedEnv.VENOM_GRAPHQL_URL,
  subscanApiBaseUrl: parsedEnv.SUBSCAN_API_BASE_URL,
  subscanApiKey: parsedEnv.SUBSCAN_API_KEY ?? null,
  rateLimitCoingeckoMinTimeMs: parsedEnv.RATE_LIMIT_COINGECKO_MIN_TIME_MS,
  rateLimitExplorerMinTimeMs: parsedEnv.RATE_LIMIT_EXPLORER_MIN_TIME_MS,
});

const mapDeliveryConfig = (
  parsedEnv: ParsedEnv,
): Pick<
  AppConfig,
  'notificationMinIntervalMs' | 'dashboardEnabled' | 'dashboardIntervalSec' | 'dashboardLimit'
> => ({
  notificationMinIntervalMs: parsedEnv.NOTIFICATION_MIN_INTERVAL_MS,
  dashboardEnabled: parsedEnv.DASHBOARD_ENABLED,
  dashboardIntervalSec: parsedEnv.DASHBOARD_INTERVAL_SEC,
  dashboardLimit: parsedEnv.DASHBOARD_LIMIT,
});
