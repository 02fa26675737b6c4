import { type IBottleneckConfig, LimiterKey } from './bottleneck-rate-limiter.interfaces';
import type { AppConfigService } from '../config/app-config.service';

const EXPLORER_LIMITER_KEYS: readonly LimiterKey[] = [
  LimiterKey.TONCENTER,
  LimiterKey.EVERSCALE_GRAPHQL,
  LimiterKey.VENOM_GRAPHQL,
  LimiterKey.SUBSCAN,
];

export function buildLimiterConfigs(
  config: AppConfigService,
): ReadonlyMap<LimiterKey, IBottleneckConfig> {
  const map = new Map<LimiterKey, IBottleneckConfig>();

  map.set(LimiterKey.COINGECKO, {
    minTime: config.rateLimitCoingeckoMinTimeMs,
    maxConcurrent: 1,
  });

  for (const key of EXPLORER_LIMITER_KEYS) {
    map.set(key, {
      minTime: config.rateLimitExplorerMinTimeMs,
      maxConcurrent: 1,
    });
  }

  // Alerts leave strictly one at a time; minTime is the pause between two sends.
  map.set(LimiterKey.TELEGRAM_NOTIFICATIONS, {
    minTime: config.notificationMinIntervalMs,
    maxConcurrent: 1,
  });

  return map;
}
