import { TvmGraphqlNetworkMonitor } from './tvm-graphql-network.monitor';
import type { IBaseNetworkMonitorOptions } from '../../../monitoring/base-network.monitor';
import { LimiterKey } from '../../../rate-limiting/bottleneck-rate-limiter.interfaces';
import type { ExplorerHttpClient } from '../http/explorer-http.client';

// The Everscale feed is busy enough that the dashboard only looks five minutes back.
const EVERSCALE_RECENT_WINDOW_SEC = 300;
const EVERSCALE_RECENT_SCAN_SIZE = 100;

export class EverscaleNetworkMonitor extends TvmGraphqlNetworkMonitor {
  public constructor(
    options: IBaseNetworkMonitorOptions,
    httpClient: ExplorerHttpClient,
    graphqlUrl: string,
    now?: () => number,
  ) {
    super(options, httpClient, {
      graphqlUrl,
      limiterKey: LimiterKey.EVERSCALE_GRAPHQL,
      recentWindowSec: EVERSCALE_RECENT_WINDOW_SEC,
      recentScanSize: EVERSCALE_RECENT_SCAN_SIZE,
      now,
    });
  }
}
