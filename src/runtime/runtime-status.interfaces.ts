import type { NetworkKey } from '../core/networks/network-key.interfaces';

export enum NetworkCycleState {
  PENDING = 'pending',
  OK = 'ok',
  FAILED = 'failed',
}

export type NetworkRuntimeEntry = {
  readonly network: NetworkKey;
  readonly state: NetworkCycleState;
  readonly lastAttemptIso: string | null;
  readonly lastSuccessIso: string | null;
  readonly lastError: string | null;
  readonly lastNewTransactions: number;
  readonly consecutiveFailures: number;
};

export type CycleRuntimeSnapshot = {
  readonly completedCycles: number;
  readonly lastCycleStartedIso: string | null;
  readonly lastCycleDurationMs: number | null;
  readonly lastCycleError: string | null;
};

export type RuntimeTelemetry = {
  readonly cycle: CycleRuntimeSnapshot;
  readonly byNetwork: Readonly<Record<string, NetworkRuntimeEntry>>;
};
