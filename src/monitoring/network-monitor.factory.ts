import type { BaseNetworkMonitor, IBaseNetworkMonitorOptions } from './base-network.monitor';
import { PriceCache } from './pricing/price-cache';
import type { AppConfigService } from '../config/app-config.service';
import { ConfigurationMissingError } from '../core/errors/monitoring.errors';
import {
  getNetworkDefinition,
  type INetworkDefinition,
} from '../core/networks/network-definitions';
import { NetworkKey } from '../core/networks/network-key.interfaces';
import type { INetworkMonitor } from '../core/ports/monitors/network-monitor.interfaces';
import type {
  IPriceSourcePort,
  PriceFailureReason,
} from '../core/ports/pricing/price-source.interfaces';
import type { ExplorerHttpClient } from '../integrations/explorers/http/explorer-http.client';
import { HumanodeNetworkMonitor } from '../integrations/explorers/subscan/humanode-network.monitor';
import { TonNetworkMonitor } from '../integrations/explorers/toncenter/ton-network.monitor';
import { EverscaleNetworkMonitor } from '../integrations/explorers/tvm-graphql/everscale-network.monitor';
import { VenomNetworkMonitor } from '../integrations/explorers/tvm-graphql/venom-network.monitor';
import type { MetricsService } from '../observability/metrics.service';

const buildMonitorOptions = (
  networkKey: NetworkKey,
  appConfigService: AppConfigService,
  priceSource: IPriceSourcePort,
  metricsService: MetricsService,
): IBaseNetworkMonitorOptions => {
  const definition: INetworkDefinition = getNetworkDefinition(networkKey);
  const priceCache: PriceCache = new PriceCache({
    networkKey,
    assetId: definition.coingeckoId,
    ttlMs: appConfigService.priceCacheTtlSec * 1000,
    priceSource,
    fallbackUsdPrice:
      networkKey === NetworkKey.HUMANODE ? appConfigService.humanodeFallbackUsdPrice : null,
    onRefreshFailure: (reason: PriceFailureReason): void => {
      metricsService.priceRefreshFailuresTotal.inc({ network: networkKey, reason });
    },
  });

  return {
    definition,
    priceCache,
    dedupCapacity: appConfigService.dedupCapacity,
    extraSystemAddresses: appConfigService.extraSystemAddresses.get(networkKey) ?? [],
    unpricedPolicy: appConfigService.usdUnpricedPolicy,
    fetchLimit: appConfigService.sourceFetchLimit,
  };
};

const createMonitor = (
  networkKey: NetworkKey,
  options: IBaseNetworkMonitorOptions,
  appConfigService: AppConfigService,
  httpClient: ExplorerHttpClient,
): BaseNetworkMonitor => {
  switch (networkKey) {
    case NetworkKey.TON:
      return new TonNetworkMonitor(options, httpClient, {
        apiBaseUrl: appConfigService.toncenterApiBaseUrl,
        apiKey: appConfigService.toncenterApiKey,
      });
    case NetworkKey.EVERSCALE: {
      const graphqlUrl: string | null = appConfigService.everscaleGraphqlUrl;

      if (graphqlUrl === null) {
        throw new ConfigurationMissingError(
          'EVERSCALE_GRAPHQL_URL is required when ENABLED_NETWORKS includes everscale',
        );
      }

      return new EverscaleNetworkMonitor(options, httpClient, graphqlUrl);
    }
    case NetworkKey.VENOM:
      return new VenomNetworkMonitor(options, httpClient, appConfigService.venomGraphqlUrl);
    case NetworkKey.HUMANODE:
      return new HumanodeNetworkMonitor(options, httpClient, {
        apiBaseUrl: appConfigService.subscanApiBaseUrl,
        apiKey: appConfigService.subscanApiKey,
      });
  }
};

/**
 * Builds one monitor per enabled network, in `ENABLED_NETWORKS` order. Every monitor
 * owns its price cache and dedup store.
 */
export const createNetworkMonitors = (
  appConfigService: AppConfigService,
  httpClient: ExplorerHttpClient,
  priceSource: IPriceSourcePort,
  metricsService: MetricsService,
): readonly INetworkMonitor[] => {
  return appConfigService.enabledNetworks.map((networkKey: NetworkKey): INetworkMonitor => {
    const options: IBaseNetworkMonitorOptions = buildMonitorOptions(
      networkKey,
      appConfigService,
      priceSource,
      metricsService,
    );

    return createMonitor(networkKey, options, appConfigService, httpClient);
  });
};
