import { describe, expect, it } from 'vitest';

import { AppConfigService } from './app-config.service';
import { AlertMode } from './app-config.types';
import { NetworkKey } from '../core/networks/network-key.interfaces';
import {
  ThresholdUnit,
  UnpricedUsdPolicy,
} from '../core/transactions/transaction.interfaces';

const withEnv = (env: NodeJS.ProcessEnv, action: () => void): void => {
  const previousEnv: NodeJS.ProcessEnv = { ...process.env };
  process.env = env;

  try {
    action();
  } finally {
    process.env = previousEnv;
  }
};

const createBaseEnv = (): NodeJS.ProcessEnv => ({
  NODE_ENV: 'test',
  PORT: '3000',
  LOG_LEVEL: 'info',
  BOT_TOKEN: 'test-secret',
  TELEGRAM_CHAT_ID: '100200300',
  EVERSCALE_GRAPHQL_URL: 'https://everscale.example.invalid/graphql',
});

describe('AppConfigService', (): void => {
  it('applies monitoring defaults', (): void => {
    withEnv(createBaseEnv(), (): void => {
      const service: AppConfigService = new AppConfigService();

      expect(service.alertMode).toBe(AlertMode.GLOBAL);
      expect(service.pollIntervalSec).toBe(60);
      expect(service.priceCacheTtlSec).toBe(300);
      expect(service.dedupCapacity).toBe(1000);
      expect(service.notificationMinIntervalMs).toBe(500);
      expect(service.usdUnpricedPolicy).toBe(UnpricedUsdPolicy.SUPPRESS);
      expect(service.databaseUrl).toBeNull();
      expect(service.enabledNetworks).toEqual([
        NetworkKey.TON,
        NetworkKey.EVERSCALE,
        NetworkKey.VENOM,
        NetworkKey.HUMANODE,
      ]);
    });
  });

  it('parses per-network thresholds with optional usd unit', (): void => {
    withEnv(
      {
        ...createBaseEnv(),
        NETWORK_THRESHOLDS: 'ton=1000,everscale=100000,venom=0.5,humo=250usd',
      },
      (): void => {
        const service: AppConfigService = new AppConfigService();

        expect(service.networkThresholds.get(NetworkKey.TON)).toEqual({
          unit: ThresholdUnit.NATIVE,
          value: 1000,
        });
        expect(service.networkThresholds.get(NetworkKey.VENOM)).toEqual({
          unit: ThresholdUnit.NATIVE,
          value: 0.5,
        });
        expect(service.networkThresholds.get(NetworkKey.HUMANODE)).toEqual({
          unit: ThresholdUnit.USD,
          value: 250,
        });
      },
    );
  });

  it('parses extra system addresses per network', (): void => {
    withEnv(
      {
        ...createBaseEnv(),
        SYSTEM_ADDRESSES: 'ton=-1:aaaa,ton=0:bbbb,venom=0:cccc',
      },
      (): void => {
        const service: AppConfigService = new AppConfigService();

        expect(service.extraSystemAddresses.get(NetworkKey.TON)).toEqual(['-1:aaaa', '0:bbbb']);
        expect(service.extraSystemAddresses.get(NetworkKey.VENOM)).toEqual(['0:cccc']);
        expect(service.extraSystemAddresses.has(NetworkKey.EVERSCALE)).toBe(false);
      },
    );
  });

  it('throws when bot token is missing', (): void => {
    const env: NodeJS.ProcessEnv = createBaseEnv();
    delete env['BOT_TOKEN'];

    withEnv(env, (): void => {
      expect((): AppConfigService => new AppConfigService()).toThrow('BOT_TOKEN is required');
    });
  });

  it('throws when global mode has no chat id', (): void => {
    const env: NodeJS.ProcessEnv = createBaseEnv();
    delete env['TELEGRAM_CHAT_ID'];

    withEnv(env, (): void => {
      expect((): AppConfigService => new AppConfigService()).toThrow(
        'TELEGRAM_CHAT_ID is required when ALERT_MODE=global',
      );
    });
  });

  it('accepts per-subscriber mode without a chat id', (): void => {
    const env: NodeJS.ProcessEnv = { ...createBaseEnv(), ALERT_MODE: 'per_subscriber' };
    delete env['TELEGRAM_CHAT_ID'];

    withEnv(env, (): void => {
      const service: AppConfigService = new AppConfigService();

      expect(service.alertMode).toBe(AlertMode.PER_SUBSCRIBER);
      expect(service.telegramChatId).toBeNull();
    });
  });

  it('throws when everscale is enabled without graphql url', (): void => {
    const env: NodeJS.ProcessEnv = createBaseEnv();
    delete env['EVERSCALE_GRAPHQL_URL'];

    withEnv(env, (): void => {
      expect((): AppConfigService => new AppConfigService()).toThrow(
        'EVERSCALE_GRAPHQL_URL is required when ENABLED_NETWORKS includes everscale',
      );
    });
  });

  it('does not require everscale url when everscale is disabled', (): void => {
    const env: NodeJS.ProcessEnv = { ...createBaseEnv(), ENABLED_NETWORKS: 'ton,venom' };
    delete env['EVERSCALE_GRAPHQL_URL'];

    withEnv(env, (): void => {
      const service: AppConfigService = new AppConfigService();

      expect(service.enabledNetworks).toEqual([NetworkKey.TON, NetworkKey.VENOM]);
      expect(service.everscaleGraphqlUrl).toBeNull();
    });
  });

  it('throws when an enabled network has no threshold', (): void => {
    withEnv(
      { ...createBaseEnv(), NETWORK_THRESHOLDS: 'ton=1000,everscale=100000,venom=0' },
      (): void => {
        expect((): AppConfigService => new AppConfigService()).toThrow(
          'NETWORK_THRESHOLDS has no entry for enabled network=humanode',
        );
      },
    );
  });

  it('throws for unknown network names', (): void => {
    withEnv({ ...createBaseEnv(), ENABLED_NETWORKS: 'ton,solana' }, (): void => {
      expect((): AppConfigService => new AppConfigService()).toThrow(
        'ENABLED_NETWORKS references unknown network "solana"',
      );
    });
  });

  it('throws for malformed threshold values', (): void => {
    withEnv({ ...createBaseEnv(), NETWORK_THRESHOLDS: 'ton=lots' }, (): void => {
      expect((): AppConfigService => new AppConfigService()).toThrow(
        'NETWORK_THRESHOLDS entry "ton=lots" has an invalid threshold value',
      );
    });
  });

  it('throws when fetch timeout exceeds poll interval', (): void => {
    withEnv(
      { ...createBaseEnv(), POLL_INTERVAL_SEC: '10', MONITOR_FETCH_TIMEOUT_MS: '20000' },
      (): void => {
        expect((): AppConfigService => new AppConfigService()).toThrow(
          'MONITOR_FETCH_TIMEOUT_MS must be <= POLL_INTERVAL_SEC * 1000',
        );
      },
    );
  });

  it('throws when one fetch batch exceeds the dedup capacity', (): void => {
    withEnv(
      { ...createBaseEnv(), SOURCE_FETCH_LIMIT: '3', DEDUP_CAPACITY: '2' },
      (): void => {
        expect((): AppConfigService => new AppConfigService()).toThrow(
          'SOURCE_FETCH_LIMIT must be <= DEDUP_CAPACITY',
        );
      },
    );
  });

  it('accepts a fetch batch equal to the dedup capacity', (): void => {
    withEnv({ ...createBaseEnv(), SOURCE_FETCH_LIMIT: '20', DEDUP_CAPACITY: '20' }, (): void => {
      const service: AppConfigService = new AppConfigService();

      expect(service.sourceFetchLimit).toBe(20);
      expect(service.dedupCapacity).toBe(20);
    });
  });
});
