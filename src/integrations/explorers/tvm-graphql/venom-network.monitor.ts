import { TvmGraphqlNetworkMonitor } from './tvm-graphql-network.monitor';
import type { IBaseNetworkMonitorOptions } from '../../../monitoring/base-network.monitor';
import { LimiterKey } from '../../../rate-limiting/bottleneck-rate-limiter.interfaces';
import type { ExplorerHttpClient } from '../http/explorer-http.client';

export class VenomNetworkMonitor extends TvmGraphqlNetworkMonitor {
  public constructor(
    options: IBaseNetworkMonitorOptions,
    httpClient: ExplorerHttpClient,
    graphqlUrl: string,
  ) {
    super(options, httpClient, {
      graphqlUrl,
      limiterKey: LimiterKey.VENOM_GRAPHQL,
      recentWindowSec: null,
      recentScanSize: null,
    });
  }
}
