import type { NetworkKey } from '../core/networks/network-key.interfaces';
import type { ITransactionRecord } from '../core/transactions/transaction.interfaces';

export enum NotificationKind {
  ALERT = 'alert',
  DASHBOARD = 'dashboard',
  SYSTEM = 'system',
}

export type AlertJob = {
  readonly destination: string;
  readonly transaction: ITransactionRecord;
};

export type DispatchSummary = {
  readonly sent: number;
  readonly failed: number;
  readonly skipped: number;
};

export interface IDashboardSection {
  readonly networkKey: NetworkKey;
  readonly transactions: readonly ITransactionRecord[];
}
