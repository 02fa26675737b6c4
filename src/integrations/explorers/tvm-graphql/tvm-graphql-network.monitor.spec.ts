import { describe, expect, it } from 'vitest';

import { EverscaleNetworkMonitor } from './everscale-network.monitor';
import { VenomNetworkMonitor } from './venom-network.monitor';
import {
  asExplorerHttpClient,
  createExplorerHttpClientStub,
  createMonitorOptions,
  type ExplorerHttpClientStub,
} from '../../../../test/helpers/monitor-test.helpers';
import {
  SourceFailureReason,
  SourceUnavailableError,
} from '../../../core/errors/monitoring.errors';
import { NetworkKey } from '../../../core/networks/network-key.interfaces';
import type { ITransactionRecord } from '../../../core/transactions/transaction.interfaces';
import { LimiterKey } from '../../../rate-limiting/bottleneck-rate-limiter.interfaces';

const NOW_SEC: number = 1_700_000_000;

const hashesOf = (records: readonly ITransactionRecord[]): readonly string[] =>
  records.map((record: ITransactionRecord): string => record.txHash);

const createVenom = (): {
  readonly monitor: VenomNetworkMonitor;
  readonly httpStub: ExplorerHttpClientStub;
} => {
  const httpStub: ExplorerHttpClientStub = createExplorerHttpClientStub();
  const monitor: VenomNetworkMonitor = new VenomNetworkMonitor(
    createMonitorOptions(NetworkKey.VENOM, 0.1),
    asExplorerHttpClient(httpStub),
    'https://venom.example.invalid/graphql',
  );

  return { monitor, httpStub };
};

const createEverscale = (): {
  readonly monitor: EverscaleNetworkMonitor;
  readonly httpStub: ExplorerHttpClientStub;
} => {
  const httpStub: ExplorerHttpClientStub = createExplorerHttpClientStub();
  const monitor: EverscaleNetworkMonitor = new EverscaleNetworkMonitor(
    createMonitorOptions(NetworkKey.EVERSCALE, 0.1),
    asExplorerHttpClient(httpStub),
    'https://everscale.example.invalid/graphql',
    (): number => NOW_SEC * 1000,
  );

  return { monitor, httpStub };
};

describe('TvmGraphqlNetworkMonitor', (): void => {
  it('posts the latest transactions query to the configured endpoint', async (): Promise<void> => {
    const { monitor, httpStub } = createVenom();
    httpStub.postJson.mockResolvedValue({ data: { transactions: [] } });

    await monitor.fetchLatestTransactions();

    const request = httpStub.postJson.mock.calls[0]?.[0];
    expect(request.network).toBe(NetworkKey.VENOM);
    expect(request.limiterKey).toBe(LimiterKey.VENOM_GRAPHQL);
    expect(String(request.url)).toBe('https://venom.example.invalid/graphql');
    expect(request.body.query).toContain('transactions(limit: 50');
  });

  it('maps valued inbound messages and skips the rest', async (): Promise<void> => {
    const { monitor, httpStub } = createVenom();
    httpStub.postJson.mockResolvedValue({
      data: {
        transactions: [
          {
            id: 'with-value',
            now: NOW_SEC,
            balance_delta: '0x0',
            account_addr: '0:dst',
            in_message: { value: '0x174876e800', src: '0:src', dst: '0:dst' },
          },
          { id: 'no-message', now: NOW_SEC, balance_delta: '0x3b9aca00', in_message: null },
          { id: 'bad-hex', now: NOW_SEC, in_message: { value: '0xnope', src: '0:a', dst: '0:b' } },
          { id: 'no-timestamp' },
        ],
      },
    });

    const records: readonly ITransactionRecord[] = await monitor.fetchLatestTransactions();

    expect(records).toEqual([
      {
        network: NetworkKey.VENOM,
        txHash: 'with-value',
        amountNative: 100,
        amountUsd: 10,
        priceVerified: true,
        sender: '0:src',
        receiver: '0:dst',
        timestamp: NOW_SEC,
      },
    ]);
  });

  it('reports graphql errors as an unavailable source', async (): Promise<void> => {
    const { monitor, httpStub } = createVenom();
    httpStub.postJson.mockResolvedValue({ data: null, errors: [{ message: 'rate limited' }] });

    const error: unknown = await monitor.fetchLatestTransactions().catch(
      (caught: unknown): unknown => caught,
    );

    expect(error).toBeInstanceOf(SourceUnavailableError);
    expect(error).toMatchObject({
      network: NetworkKey.VENOM,
      reason: SourceFailureReason.INVALID_RESPONSE,
    });
  });

  it('uses the balance delta for dashboard rows without an inbound value', async (): Promise<void> => {
    const { monitor, httpStub } = createVenom();
    httpStub.postJson.mockResolvedValue({
      data: {
        transactions: [
          { id: 'delta', now: NOW_SEC, balance_delta: '0x3b9aca00', account_addr: '0:acc' },
          { id: 'negative', now: NOW_SEC, balance_delta: '-0x3b9aca00', account_addr: '0:acc' },
        ],
      },
    });

    const records: readonly ITransactionRecord[] = await monitor.fetchRecentAnyAmount(3);

    expect(httpStub.postJson.mock.calls[0]?.[0].body.query).toContain('transactions(limit: 3');
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      txHash: 'delta',
      amountNative: 1,
      sender: 'unknown',
      receiver: '0:acc',
    });
  });

  it('limits the everscale dashboard to the last five minutes', async (): Promise<void> => {
    const { monitor, httpStub } = createEverscale();
    httpStub.postJson.mockResolvedValue({
      data: {
        transactions: [
          {
            id: 'fresh',
            now: NOW_SEC - 300,
            in_message: { value: '0x3b9aca00', src: '0:a', dst: '0:b' },
          },
          {
            id: 'old',
            now: NOW_SEC - 301,
            in_message: { value: '0x3b9aca00', src: '0:a', dst: '0:b' },
          },
        ],
      },
    });

    const records: readonly ITransactionRecord[] = await monitor.fetchRecentAnyAmount(5);

    expect(httpStub.postJson.mock.calls[0]?.[0].body.query).toContain('transactions(limit: 100');
    expect(hashesOf(records)).toEqual(['fresh']);
  });
});
