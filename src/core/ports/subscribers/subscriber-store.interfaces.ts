import type { NetworkKey } from '../../networks/network-key.interfaces';
import type { INetworkThreshold } from '../../transactions/transaction.interfaces';

export type ThresholdOverrides = Readonly<Partial<Record<NetworkKey, INetworkThreshold>>>;

export interface ISubscriberRecord {
  readonly channelId: string;
  readonly enabled: boolean;
  readonly thresholds: ThresholdOverrides;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface ISubscriberStore {
  loadAll(): Promise<readonly ISubscriberRecord[]>;
  save(record: ISubscriberRecord): Promise<void>;
}
