import {
  buildLatestTransactionsQuery,
  type TvmTransaction,
  tvmTransactionSchema,
  tvmTransactionsResponseSchema,
} from './tvm-graphql.interfaces';
import {
  MalformedRecordError,
  SourceFailureReason,
  SourceUnavailableError,
} from '../../../core/errors/monitoring.errors';
import {
  BaseNetworkMonitor,
  type IBaseNetworkMonitorOptions,
  type INormalizedTransfer,
} from '../../../monitoring/base-network.monitor';
import type { LimiterKey } from '../../../rate-limiting/bottleneck-rate-limiter.interfaces';
import type { ExplorerHttpClient } from '../http/explorer-http.client';
import { parseMinorUnits, UNKNOWN_ADDRESS } from '../shared/amount.util';

const TVM_DECIMALS = 9;

export interface ITvmGraphqlSourceOptions {
  readonly graphqlUrl: string;
  readonly limiterKey: LimiterKey;
  /** Dashboard only shows transactions newer than this many seconds; null disables the cut. */
  readonly recentWindowSec: number | null;
  /** How many transactions the dashboard query scans; null scans exactly `limit`. */
  readonly recentScanSize: number | null;
  readonly now?: () => number;
}

/**
 * Everscale-family GraphQL feed. Alerts consider only transactions with a valued inbound
 * internal message; the dashboard falls back to the account balance delta.
 */
export abstract class TvmGraphqlNetworkMonitor extends BaseNetworkMonitor {
  private readonly now: () => number;

  protected constructor(
    options: IBaseNetworkMonitorOptions,
    private readonly httpClient: ExplorerHttpClient,
    private readonly sourceOptions: ITvmGraphqlSourceOptions,
  ) {
    super(options);
    this.now = sourceOptions.now ?? Date.now;
  }

  protected async loadLatestTransfers(
    limit: number,
    signal?: AbortSignal,
  ): Promise<readonly INormalizedTransfer[]> {
    const transactions: readonly unknown[] = await this.queryTransactions(limit, signal);

    return this.mapRecords(transactions, (rawItem: unknown): INormalizedTransfer | null =>
      this.mapInMessageTransfer(this.parseTransaction(rawItem)),
    );
  }

  protected override async loadRecentTransfers(
    limit: number,
  ): Promise<readonly INormalizedTransfer[]> {
    const transactions: readonly unknown[] = await this.queryTransactions(
      this.sourceOptions.recentScanSize ?? limit,
    );
    const minTimestamp: number | null =
      this.sourceOptions.recentWindowSec === null
        ? null
        : Math.floor(this.now() / 1000) - this.sourceOptions.recentWindowSec;

    return this.mapRecords(transactions, (rawItem: unknown): INormalizedTransfer | null => {
      const transaction: TvmTransaction = this.parseTransaction(rawItem);

      if (minTimestamp !== null && transaction.now < minTimestamp) {
        return null;
      }

      return this.mapInMessageTransfer(transaction) ?? this.mapBalanceDeltaTransfer(transaction);
    });
  }

  private async queryTransactions(
    limit: number,
    signal?: AbortSignal,
  ): Promise<readonly unknown[]> {
    const payload: unknown = await this.httpClient.postJson({
      network: this.networkKey,
      limiterKey: this.sourceOptions.limiterKey,
      url: new URL(this.sourceOptions.graphqlUrl),
      body: { query: buildLatestTransactionsQuery(limit) },
      signal,
    });
    const parsedPayload = tvmTransactionsResponseSchema.safeParse(payload);

    if (!parsedPayload.success) {
      throw new SourceUnavailableError(
        this.networkKey,
        SourceFailureReason.INVALID_RESPONSE,
        'graphql response has an unexpected shape',
      );
    }

    const transactions: readonly unknown[] | null | undefined =
      parsedPayload.data.data?.transactions;

    if (transactions === null || transactions === undefined) {
      const graphqlError: string =
        parsedPayload.data.errors?.[0]?.message ?? 'transactions field is missing';
      throw new SourceUnavailableError(
        this.networkKey,
        SourceFailureReason.INVALID_RESPONSE,
        graphqlError,
      );
    }

    return transactions;
  }

  private parseTransaction(rawItem: unknown): TvmTransaction {
    const parsedItem = tvmTransactionSchema.safeParse(rawItem);

    if (!parsedItem.success) {
      throw new MalformedRecordError(this.networkKey, parsedItem.error.message);
    }

    return parsedItem.data;
  }

  private mapInMessageTransfer(transaction: TvmTransaction): INormalizedTransfer | null {
    const inMessage: TvmTransaction['in_message'] = transaction.in_message;

    if (inMessage === null || inMessage === undefined || !inMessage.value) {
      return null;
    }

    const amountNative: number = this.parseAmount(transaction.id, inMessage.value);

    if (amountNative <= 0) {
      return null;
    }

    return {
      txHash: transaction.id,
      amountNative,
      sender: inMessage.src || UNKNOWN_ADDRESS,
      receiver: inMessage.dst || transaction.account_addr || UNKNOWN_ADDRESS,
      timestamp: transaction.now,
    };
  }

  private mapBalanceDeltaTransfer(transaction: TvmTransaction): INormalizedTransfer | null {
    if (!transaction.balance_delta) {
      return null;
    }

    const amountNative: number = this.parseAmount(transaction.id, transaction.balance_delta);

    if (amountNative <= 0) {
      return null;
    }

    return {
      txHash: transaction.id,
      amountNative,
      sender: UNKNOWN_ADDRESS,
      receiver: transaction.account_addr || UNKNOWN_ADDRESS,
      timestamp: transaction.now,
    };
  }

  private parseAmount(txHash: string, raw: string): number {
    const amount: number | null = parseMinorUnits(raw, TVM_DECIMALS);

    if (amount === null) {
      throw new MalformedRecordError(this.networkKey, `id=${txHash} amount=${raw}`);
    }

    return amount;
  }
}
