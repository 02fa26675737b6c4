import { Injectable } from '@nestjs/common';

import { mapAppConfig } from './app-config.mapper';
import { envSchema, type ParsedEnv } from './app-config.schema';
import type { AlertMode, AppConfig } from './app-config.types';
import { assertMonitoringConfig, requireBotToken } from './app-config.validators';
import type { NetworkKey } from '../core/networks/network-key.interfaces';
import type {
  ThresholdMap,
  UnpricedUsdPolicy,
} from '../core/transactions/transaction.interfaces';

@Injectable()
export class AppConfigService {
  private readonly config: AppConfig;

  public constructor() {
    const parsedEnv: ParsedEnv = envSchema.parse(process.env);
    const botToken: string = requireBotToken(parsedEnv);
    assertMonitoringConfig(parsedEnv);

    this.config = mapAppConfig(parsedEnv, botToken);
  }

  public get appVersion(): string {
    return this.config.appVersion;
  }

  public get nodeEnv(): AppConfig['nodeEnv'] {
    return this.config.nodeEnv;
  }

  public get port(): number {
    return this.config.port;
  }

  public get logLevel(): AppConfig['logLevel'] {
    return this.config.logLevel;
  }

  public get metricsEnabled(): boolean {
    return this.config.metricsEnabled;
  }

  public get botToken(): string {
    return this.config.botToken;
  }

  public get telegramChatId(): string | null {
    return this.config.telegramChatId;
  }

  public get alertMode(): AlertMode {
    return this.config.alertMode;
  }

  public get databaseUrl(): string | null {
    return this.config.databaseUrl;
  }

  public get pollIntervalSec(): number {
    return this.config.pollIntervalSec;
  }

  public get monitorFetchTimeoutMs(): number {
    return this.config.monitorFetchTimeoutMs;
  }

  public get enabledNetworks(): readonly NetworkKey[] {
    return this.config.enabledNetworks;
  }

  public get networkThresholds(): ThresholdMap {
    return this.config.networkThresholds;
  }

  public get usdUnpricedPolicy(): UnpricedUsdPolicy {
    return this.config.usdUnpricedPolicy;
  }

  public get extraSystemAddresses(): ReadonlyMap<NetworkKey, readonly string[]> {
    return this.config.extraSystemAddresses;
  }

  public get sourceFetchLimit(): number {
    return this.config.sourceFetchLimit;
  }

  public get dedupCapacity(): number {
    return this.config.dedupCapacity;
  }

  public get coingeckoApiBaseUrl(): string {
    return this.config.coingeckoApiBaseUrl;
  }

  public get coingeckoTimeoutMs(): number {
    return this.config.coingeckoTimeoutMs;
  }

  public get priceCacheTtlSec(): number {
    return this.config.priceCacheTtlSec;
  }

  public get humanodeFallbackUsdPrice(): number {
    return this.config.humanodeFallbackUsdPrice;
  }

  public get toncenterApiBaseUrl(): string {
    return this.config.toncenterApiBaseUrl;
  }

  public get toncenterApiKey(): string | null {
    return this.config.toncenterApiKey;
  }

  public get everscaleGraphqlUrl(): string | null {
    return this.config.everscaleGraphqlUrl;
  }

  public get venomGraphqlUrl(): string {
    return this.config.venomGraphqlUrl;
  }

  public get subscanApiBaseUrl(): string {
    return this.config.subscanApiBaseUrl;
  }

  public get subscanApiKey(): string | null {
    return this.config.subscanApiKey;
  }

  public get notificationMinIntervalMs(): number {
    return this.config.notificationMinIntervalMs;
  }

  public get dashboardEnabled(): boolean {
    return this.config.dashboardEnabled;
  }

  public get dashboardIntervalSec(): number {
    return this.config.dashboardIntervalSec;
  }

  public get dashboardLimit(): number {
    return this.config.dashboardLimit;
  }

  public get rateLimitCoingeckoMinTimeMs(): number {
    return this.config.rateLimitCoingeckoMinTimeMs;
  }

  public get rateLimitExplorerMinTimeMs(): number {
    return this.config.rateLimitExplorerMinTimeMs;
  }
}
