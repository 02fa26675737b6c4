import type { NetworkKey } from '../core/networks/network-key.interfaces';
import type { INetworkThreshold } from '../core/transactions/transaction.interfaces';

export enum ThresholdArgsError {
  USAGE = 'usage',
  UNKNOWN_NETWORK = 'unknown_network',
  INVALID_VALUE = 'invalid_value',
}

export type ThresholdArgsParseResult =
  | {
      readonly ok: true;
      readonly networkKey: NetworkKey;
      readonly threshold: INetworkThreshold;
    }
  | {
      readonly ok: false;
      readonly error: ThresholdArgsError;
      readonly rawValue: string | null;
    };
