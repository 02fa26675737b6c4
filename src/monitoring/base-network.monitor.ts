import { Logger } from '@nestjs/common';

import { DedupStore } from './dedup/dedup-store';
import {
  buildSystemAddressSet,
  isSystemTransfer,
  passesThreshold,
} from './filters/transaction-filter.util';
import type { PriceCache } from './pricing/price-cache';
import {
  MalformedRecordError,
  SourceFailureReason,
  SourceUnavailableError,
} from '../core/errors/monitoring.errors';
import type { INetworkDefinition } from '../core/networks/network-definitions';
import type { NetworkKey } from '../core/networks/network-key.interfaces';
import type { INetworkMonitor } from '../core/ports/monitors/network-monitor.interfaces';
import type { IPriceQuote } from '../core/ports/pricing/price-source.interfaces';
import type {
  INetworkThreshold,
  ITransactionRecord,
  UnpricedUsdPolicy,
} from '../core/transactions/transaction.interfaces';

export interface INormalizedTransfer {
  readonly txHash: string;
  readonly amountNative: number;
  readonly sender: string;
  readonly receiver: string;
  readonly timestamp: number;
}

export interface IBaseNetworkMonitorOptions {
  readonly definition: INetworkDefinition;
  readonly priceCache: PriceCache;
  readonly dedupCapacity: number;
  readonly extraSystemAddresses: readonly string[];
  readonly unpricedPolicy: UnpricedUsdPolicy;
  readonly fetchLimit: number;
}

/**
 * Shared pipeline for every network: load, price, drop system transfers, dedup and
 * threshold. Subclasses only know how to talk to their explorer and turn its payload
 * into {@link INormalizedTransfer} values.
 */
export abstract class BaseNetworkMonitor implements INetworkMonitor {
  protected readonly logger: Logger;
  private readonly dedupStore: DedupStore;
  private readonly systemAddresses: ReadonlySet<string>;

  protected constructor(private readonly options: IBaseNetworkMonitorOptions) {
    this.logger = new Logger(`${BaseNetworkMonitor.name}:${options.definition.key}`);
    this.dedupStore = new DedupStore(options.dedupCapacity);
    this.systemAddresses = buildSystemAddressSet([
      ...options.definition.systemAddresses,
      ...options.extraSystemAddresses,
    ]);
  }

  public get networkKey(): NetworkKey {
    return this.options.definition.key;
  }

  public get displayName(): string {
    return this.options.definition.displayName;
  }

  protected abstract loadLatestTransfers(
    limit: number,
    signal?: AbortSignal,
  ): Promise<readonly INormalizedTransfer[]>;

  // Dashboard feed; networks whose latest feed is too narrow override this.
  protected async loadRecentTransfers(limit: number): Promise<readonly INormalizedTransfer[]> {
    return this.loadLatestTransfers(limit);
  }

  public async fetchLatestTransactions(
    signal?: AbortSignal,
  ): Promise<readonly ITransactionRecord[]> {
    const transfers: readonly INormalizedTransfer[] = await this.loadLatestTransfers(
      this.options.fetchLimit,
      signal,
    );

    return this.toTransactionRecords(transfers);
  }

  public async fetchAndFilter(
    threshold?: INetworkThreshold | null,
    signal?: AbortSignal,
  ): Promise<readonly ITransactionRecord[]> {
    const latest: readonly ITransactionRecord[] = await this.fetchLatestTransactions(signal);

    // Nobody dispatches an abandoned result, so its hashes must stay unseen.
    if (signal?.aborted === true) {
      this.logger.warn(
        `fetchAndFilter discarded late result network=${this.networkKey} fetched=${String(latest.length)}`,
      );
      throw new SourceUnavailableError(
        this.networkKey,
        SourceFailureReason.TIMEOUT,
        'fetch aborted before filtering',
      );
    }

    const accepted: ITransactionRecord[] = [];

    // System transfers are dropped before dedup so they never occupy a slot.
    for (const transaction of latest) {
      if (isSystemTransfer(transaction, this.systemAddresses)) {
        continue;
      }

      if (!this.dedupStore.isNew(transaction.txHash)) {
        continue;
      }

      if (
        threshold !== undefined &&
        threshold !== null &&
        !passesThreshold(transaction, threshold, this.options.unpricedPolicy)
      ) {
        continue;
      }

      accepted.push(transaction);
    }

    this.logger.debug(
      `fetchAndFilter network=${this.networkKey} fetched=${String(latest.length)} accepted=${String(accepted.length)}`,
    );

    return accepted;
  }

  public async fetchRecentAnyAmount(limit: number): Promise<readonly ITransactionRecord[]> {
    try {
      const transfers: readonly INormalizedTransfer[] = await this.loadRecentTransfers(limit);
      const nonZero: readonly INormalizedTransfer[] = transfers
        .filter((transfer: INormalizedTransfer): boolean => transfer.amountNative > 0)
        .slice(0, limit);

      return await this.toTransactionRecords(nonZero);
    } catch (error: unknown) {
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      this.logger.warn(`recent fetch failed network=${this.networkKey} reason=${errorMessage}`);
      return [];
    }
  }

  public async getCurrentPrice(): Promise<IPriceQuote | null> {
    return this.options.priceCache.getPrice();
  }

  /**
   * Maps raw explorer items one by one. A {@link MalformedRecordError} skips the item;
   * any other error propagates.
   */
  protected mapRecords<TRaw>(
    rawItems: readonly TRaw[],
    mapper: (rawItem: TRaw) => INormalizedTransfer | null,
  ): readonly INormalizedTransfer[] {
    const transfers: INormalizedTransfer[] = [];

    for (const rawItem of rawItems) {
      try {
        const transfer: INormalizedTransfer | null = mapper(rawItem);

        if (transfer !== null) {
          transfers.push(transfer);
        }
      } catch (error: unknown) {
        if (!(error instanceof MalformedRecordError)) {
          throw error;
        }

        this.logger.debug(`record skipped network=${this.networkKey} reason=${error.message}`);
      }
    }

    return transfers;
  }

  private async toTransactionRecords(
    transfers: readonly INormalizedTransfer[],
  ): Promise<readonly ITransactionRecord[]> {
    if (transfers.length === 0) {
      return [];
    }

    const quote: IPriceQuote | null = await this.options.priceCache.getPrice();

    return transfers.map(
      (transfer: INormalizedTransfer): ITransactionRecord => ({
        network: this.networkKey,
        txHash: transfer.txHash,
        amountNative: transfer.amountNative,
        amountUsd: quote === null ? null : transfer.amountNative * quote.usdPrice,
        priceVerified: quote?.verified ?? false,
        sender: transfer.sender,
        receiver: transfer.receiver,
        timestamp: transfer.timestamp,
      }),
    );
  }
}
