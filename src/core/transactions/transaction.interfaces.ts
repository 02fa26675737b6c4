import type { NetworkKey } from '../networks/network-key.interfaces';

export interface ITransactionRecord {
  readonly network: NetworkKey;
  readonly txHash: string;
  readonly amountNative: number;
  readonly amountUsd: number | null;
  readonly priceVerified: boolean;
  readonly sender: string;
  readonly receiver: string;
  readonly timestamp: number;
}

export enum ThresholdUnit {
  NATIVE = 'native',
  USD = 'usd',
}

export interface INetworkThreshold {
  readonly unit: ThresholdUnit;
  readonly value: number;
}

export type ThresholdMap = ReadonlyMap<NetworkKey, INetworkThreshold>;

export enum UnpricedUsdPolicy {
  SUPPRESS = 'suppress',
  PASS = 'pass',
}
