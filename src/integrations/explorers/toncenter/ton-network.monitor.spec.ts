import { describe, expect, it } from 'vitest';

import { TonNetworkMonitor } from './ton-network.monitor';
import {
  asExplorerHttpClient,
  createExplorerHttpClientStub,
  createMonitorOptions,
  type ExplorerHttpClientStub,
} from '../../../../test/helpers/monitor-test.helpers';
import { SourceUnavailableError } from '../../../core/errors/monitoring.errors';
import { NetworkKey } from '../../../core/networks/network-key.interfaces';
import type { ITransactionRecord } from '../../../core/transactions/transaction.interfaces';
import { LimiterKey } from '../../../rate-limiting/bottleneck-rate-limiter.interfaces';

const createMonitor = (
  apiKey: string | null = null,
): { readonly monitor: TonNetworkMonitor; readonly httpStub: ExplorerHttpClientStub } => {
  const httpStub: ExplorerHttpClientStub = createExplorerHttpClientStub();
  const monitor: TonNetworkMonitor = new TonNetworkMonitor(
    createMonitorOptions(NetworkKey.TON, 2),
    asExplorerHttpClient(httpStub),
    { apiBaseUrl: 'https://toncenter.example.invalid/api/v3/', apiKey },
  );

  return { monitor, httpStub };
};

describe('TonNetworkMonitor', (): void => {
  it('requests the latest transactions in descending order', async (): Promise<void> => {
    const { monitor, httpStub } = createMonitor('test-secret');
    httpStub.getJson.mockResolvedValue({ transactions: [] });

    await monitor.fetchLatestTransactions();

    const request = httpStub.getJson.mock.calls[0]?.[0];
    expect(request.network).toBe(NetworkKey.TON);
    expect(request.limiterKey).toBe(LimiterKey.TONCENTER);
    expect(request.headers).toEqual({ 'X-API-Key': 'test-secret' });
    expect(String(request.url)).toBe(
      'https://toncenter.example.invalid/api/v3/transactions?limit=50&offset=0&sort=desc',
    );
  });

  it('maps internal value transfers to nano-scaled records', async (): Promise<void> => {
    const { monitor, httpStub } = createMonitor();
    httpStub.getJson.mockResolvedValue({
      transactions: [
        {
          hash: 'tx-a',
          now: 1_700_000_100,
          account: '0:RECEIVER',
          in_msg: { source: '0:SENDER', destination: '0:RECEIVER', value: '2500000000000' },
        },
      ],
    });

    const records: readonly ITransactionRecord[] = await monitor.fetchLatestTransactions();

    expect(records).toEqual([
      {
        network: NetworkKey.TON,
        txHash: 'tx-a',
        amountNative: 2500,
        amountUsd: 5000,
        priceVerified: true,
        sender: '0:SENDER',
        receiver: '0:RECEIVER',
        timestamp: 1_700_000_100,
      },
    ]);
  });

  it('skips external, zero-value and malformed records', async (): Promise<void> => {
    const { monitor, httpStub } = createMonitor();
    httpStub.getJson.mockResolvedValue({
      transactions: [
        { hash: 'external', now: 1, in_msg: { source: null, destination: '0:A', value: null } },
        { hash: 'zero', now: 2, in_msg: { source: '0:B', destination: '0:A', value: '0' } },
        { hash: 'broken', now: 3, in_msg: { source: '0:B', destination: '0:A', value: 'x' } },
        { now: 4 },
        { hash: 'kept', now: 5, in_msg: { source: '0:B', destination: '0:A', value: '1000000000' } },
      ],
    });

    const records: readonly ITransactionRecord[] = await monitor.fetchLatestTransactions();

    expect(records.map((record: ITransactionRecord): string => record.txHash)).toEqual(['kept']);
  });

  it('fails the source when the payload has no transaction list', async (): Promise<void> => {
    const { monitor, httpStub } = createMonitor();
    httpStub.getJson.mockResolvedValue({ error: 'bad request' });

    await expect(monitor.fetchLatestTransactions()).rejects.toBeInstanceOf(SourceUnavailableError);
  });
});
