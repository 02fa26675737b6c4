import { Injectable, Logger } from '@nestjs/common';

import {
  type CycleRuntimeSnapshot,
  NetworkCycleState,
  type NetworkRuntimeEntry,
  type RuntimeTelemetry,
} from './runtime-status.interfaces';
import { RateLimitedWarningEmitter } from '../common/utils/logging/rate-limited-warning-emitter';
import type { NetworkKey } from '../core/networks/network-key.interfaces';

const WARN_COOLDOWN_MS = 60_000;
const CONSECUTIVE_FAILURES_WARN = 3;

@Injectable()
export class RuntimeStatusService {
  private readonly logger: Logger = new Logger(RuntimeStatusService.name);
  private readonly warningEmitter: RateLimitedWarningEmitter = new RateLimitedWarningEmitter(
    WARN_COOLDOWN_MS,
  );
  private readonly networkEntries: Map<NetworkKey, NetworkRuntimeEntry> = new Map<
    NetworkKey,
    NetworkRuntimeEntry
  >();
  private cycle: CycleRuntimeSnapshot = {
    completedCycles: 0,
    lastCycleStartedIso: null,
    lastCycleDurationMs: null,
    lastCycleError: null,
  };

  public registerNetwork(network: NetworkKey): void {
    if (this.networkEntries.has(network)) {
      return;
    }

    this.networkEntries.set(network, {
      network,
      state: NetworkCycleState.PENDING,
      lastAttemptIso: null,
      lastSuccessIso: null,
      lastError: null,
      lastNewTransactions: 0,
      consecutiveFailures: 0,
    });
  }

  public recordNetworkSuccess(network: NetworkKey, newTransactions: number): void {
    const nowIso: string = new Date().toISOString();

    if (this.warningEmitter.reset(`network:${network}`)) {
      this.logger.log(`network recovered network=${network}`);
    }

    this.networkEntries.set(network, {
      network,
      state: NetworkCycleState.OK,
      lastAttemptIso: nowIso,
      lastSuccessIso: nowIso,
      lastError: null,
      lastNewTransactions: newTransactions,
      consecutiveFailures: 0,
    });
  }

  public recordNetworkFailure(network: NetworkKey, errorMessage: string): void {
    const previous: NetworkRuntimeEntry | undefined = this.networkEntries.get(network);
    const consecutiveFailures: number = (previous?.consecutiveFailures ?? 0) + 1;

    this.networkEntries.set(network, {
      network,
      state: NetworkCycleState.FAILED,
      lastAttemptIso: new Date().toISOString(),
      lastSuccessIso: previous?.lastSuccessIso ?? null,
      lastError: errorMessage,
      lastNewTransactions: 0,
      consecutiveFailures,
    });

    if (
      consecutiveFailures >= CONSECUTIVE_FAILURES_WARN &&
      this.warningEmitter.shouldEmit(`network:${network}`)
    ) {
      this.logger.warn(
        `network degraded network=${network} consecutiveFailures=${String(consecutiveFailures)} lastError=${errorMessage}`,
      );
    }
  }

  public recordCycle(startedAtMs: number, durationMs: number, errorMessage: string | null): void {
    this.cycle = {
      completedCycles: this.cycle.completedCycles + 1,
      lastCycleStartedIso: new Date(startedAtMs).toISOString(),
      lastCycleDurationMs: durationMs,
      lastCycleError: errorMessage,
    };
  }

  public getNetworkEntry(network: NetworkKey): NetworkRuntimeEntry | null {
    return this.networkEntries.get(network) ?? null;
  }

  public listNetworkEntries(): readonly NetworkRuntimeEntry[] {
    return [...this.networkEntries.values()];
  }

  public getTelemetry(): RuntimeTelemetry {
    const byNetwork: Record<string, NetworkRuntimeEntry> = {};

    for (const [key, entry] of this.networkEntries) {
      byNetwork[key] = entry;
    }

    return { cycle: this.cycle, byNetwork };
  }
}
