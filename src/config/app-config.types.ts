import type { NetworkKey } from '../core/networks/network-key.interfaces';
import type { ThresholdMap, UnpricedUsdPolicy } from '../core/transactions/transaction.interfaces';

export type NodeEnv = 'development' | 'test' | 'production';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export enum AlertMode {
  GLOBAL = 'global',
  PER_SUBSCRIBER = 'per_subscriber',
}

export type AppConfig = {
  readonly appVersion: string;
  readonly nodeEnv: NodeEnv;
  readonly port: number;
  readonly logLevel: LogLevel;
  readonly metricsEnabled: boolean;
  readonly botToken: string;
  readonly telegramChatId: string | null;
  readonly alertMode: AlertMode;
  readonly databaseUrl: string | null;
  readonly pollIntervalSec: number;
  readonly monitorFetchTimeoutMs: number;
  readonly enabledNetworks: readonly NetworkKey[];
  readonly networkThresholds: ThresholdMap;
  readonly usdUnpricedPolicy: UnpricedUsdPolicy;
  readonly extraSystemAddresses: ReadonlyMap<NetworkKey, readonly string[]>;
  readonly sourceFetchLimit: number;
  readonly dedupCapacity: number;
  readonly coingeckoApiBaseUrl: string;
  readonly coingeckoTimeoutMs: number;
  readonly priceCacheTtlSec: number;
  readonly humanodeFallbackUsdPrice: number;
  readonly toncenterApiBaseUrl: string;
  readonly toncenterApiKey: string | null;
  readonly everscaleGraphqlUrl: string | null;
  readonly venomGraphqlUrl: string;
  readonly subscanApiBaseUrl: string;
  readonly subscanApiKey: string | null;
  readonly notificationMinIntervalMs: number;
  readonly dashboardEnabled: boolean;
  readonly dashboardIntervalSec: number;
  readonly dashboardLimit: number;
  readonly rateLimitCoingeckoMinTimeMs: number;
  readonly rateLimitExplorerMinTimeMs: number;
};
