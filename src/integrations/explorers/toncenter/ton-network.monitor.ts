import {
  type ToncenterTransaction,
  toncenterTransactionSchema,
  toncenterTransactionsResponseSchema,
} from './toncenter-transactions.interfaces';
import {
  MalformedRecordError,
  SourceFailureReason,
  SourceUnavailableError,
} from '../../../core/errors/monitoring.errors';
import { NetworkKey } from '../../../core/networks/network-key.interfaces';
import {
  BaseNetworkMonitor,
  type IBaseNetworkMonitorOptions,
  type INormalizedTransfer,
} from '../../../monitoring/base-network.monitor';
import { LimiterKey } from '../../../rate-limiting/bottleneck-rate-limiter.interfaces';
import type { ExplorerHttpClient } from '../http/explorer-http.client';
import { parseMinorUnits, UNKNOWN_ADDRESS } from '../shared/amount.util';

const TON_DECIMALS = 9;

export interface IToncenterSourceOptions {
  readonly apiBaseUrl: string;
  readonly apiKey: string | null;
}

/**
 * Reads the global transaction feed of toncenter v3 and reports internal messages that
 * carried value into an account.
 */
export class TonNetworkMonitor extends BaseNetworkMonitor {
  public constructor(
    options: IBaseNetworkMonitorOptions,
    private readonly httpClient: ExplorerHttpClient,
    private readonly sourceOptions: IToncenterSourceOptions,
  ) {
    super(options);
  }

  protected async loadLatestTransfers(
    limit: number,
    signal?: AbortSignal,
  ): Promise<readonly INormalizedTransfer[]> {
    const payload: unknown = await this.httpClient.getJson({
      network: NetworkKey.TON,
      limiterKey: LimiterKey.TONCENTER,
      url: this.buildTransactionsUrl(limit),
      headers:
        this.sourceOptions.apiKey === null ? {} : { 'X-API-Key': this.sourceOptions.apiKey },
      signal,
    });
    const parsedPayload = toncenterTransactionsResponseSchema.safeParse(payload);

    if (!parsedPayload.success) {
      throw new SourceUnavailableError(
        NetworkKey.TON,
        SourceFailureReason.INVALID_RESPONSE,
        'toncenter response has no transactions array',
      );
    }

    return this.mapRecords(
      parsedPayload.data.transactions,
      (rawItem: unknown): INormalizedTransfer | null => this.mapTransaction(rawItem),
    );
  }

  private mapTransaction(rawItem: unknown): INormalizedTransfer | null {
    const parsedItem = toncenterTransactionSchema.safeParse(rawItem);

    if (!parsedItem.success) {
      throw new MalformedRecordError(NetworkKey.TON, parsedItem.error.message);
    }

    const transaction: ToncenterTransaction = parsedItem.data;
    const inMessage: ToncenterTransaction['in_msg'] = transaction.in_msg;

    // External messages have no source and carry no value.
    if (
      inMessage === null ||
      inMessage === undefined ||
      typeof inMessage.source !== 'string' ||
      typeof inMessage.value !== 'string'
    ) {
      return null;
    }

    const amountNative: number | null = parseMinorUnits(inMessage.value, TON_DECIMALS);

    if (amountNative === null) {
      throw new MalformedRecordError(
        NetworkKey.TON,
        `hash=${transaction.hash} value=${inMessage.value}`,
      );
    }

    if (amountNative <= 0) {
      return null;
    }

    return {
      txHash: transaction.hash,
      amountNative,
      sender: inMessage.source,
      receiver: inMessage.destination ?? transaction.account ?? UNKNOWN_ADDRESS,
      timestamp: transaction.now,
    };
  }

  private buildTransactionsUrl(limit: number): URL {
    const baseUrl: string = this.sourceOptions.apiBaseUrl.replace(/\/+$/, '');
    const url: URL = new URL(`${baseUrl}/transactions`);
    url.searchParams.set('limit', String(limit));
    url.searchParams.set('offset', '0');
    url.searchParams.set('sort', 'desc');
    return url;
  }
}
