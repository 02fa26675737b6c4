import type { NetworkKey } from '../../networks/network-key.interfaces';
import type {
  INetworkThreshold,
  ITransactionRecord,
} from '../../transactions/transaction.interfaces';
import type { IPriceQuote } from '../pricing/price-source.interfaces';

export interface INetworkMonitor {
  readonly networkKey: NetworkKey;
  readonly displayName: string;
  fetchLatestTransactions(signal?: AbortSignal): Promise<readonly ITransactionRecord[]>;
  // An aborted signal leaves the dedup state untouched, even when the source answers late.
  fetchAndFilter(
    threshold?: INetworkThreshold | null,
    signal?: AbortSignal,
  ): Promise<readonly ITransactionRecord[]>;
  fetchRecentAnyAmount(limit: number): Promise<readonly ITransactionRecord[]>;
  getCurrentPrice(): Promise<IPriceQuote | null>;
}
