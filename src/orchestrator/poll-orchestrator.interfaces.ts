import type { DispatchSummary } from '../alerts/alert.interfaces';
import type { NetworkKey } from '../core/networks/network-key.interfaces';
import type { ITransactionRecord } from '../core/transactions/transaction.interfaces';

export enum OrchestratorState {
  IDLE = 'idle',
  POLLING = 'polling',
  DISPATCHING = 'dispatching',
  SLEEPING = 'sleeping',
  STOPPED = 'stopped',
}

export enum CycleSkipReason {
  STOPPED = 'stopped',
  NO_SUBSCRIBERS = 'no_subscribers',
}

export type NetworkFetchOutcome =
  | {
      readonly network: NetworkKey;
      readonly ok: true;
      readonly transactions: readonly ITransactionRecord[];
    }
  | {
      readonly network: NetworkKey;
      readonly ok: false;
      readonly errorMessage: string;
    };

export type PollCycleReport = {
  readonly skipReason: CycleSkipReason | null;
  readonly outcomes: readonly NetworkFetchOutcome[];
  readonly dispatch: DispatchSummary;
};
