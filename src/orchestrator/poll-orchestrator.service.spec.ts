import { afterEach, describe, expect, it, vi } from 'vitest';

import {
  CycleSkipReason,
  OrchestratorState,
  type PollCycleReport,
} from './poll-orchestrator.interfaces';
import { PollOrchestratorService } from './poll-orchestrator.service';
import type { AlertMessageFormatter } from '../alerts/alert-message.formatter';
import type { NotificationDispatcherService } from '../alerts/notification-dispatcher.service';
import { OperationTimeoutError } from '../common/utils/async/with-timeout.util';
import type { AppConfigService } from '../config/app-config.service';
import { AlertMode } from '../config/app-config.types';
import { SourceFailureReason, SourceUnavailableError } from '../core/errors/monitoring.errors';
import { NetworkKey } from '../core/networks/network-key.interfaces';
import type { INetworkMonitor } from '../core/ports/monitors/network-monitor.interfaces';
import {
  type INetworkThreshold,
  type ITransactionRecord,
  ThresholdUnit,
  UnpricedUsdPolicy,
} from '../core/transactions/transaction.interfaces';
import type { MetricsService } from '../observability/metrics.service';
import { NetworkCycleState } from '../runtime/runtime-status.interfaces';
import { RuntimeStatusService } from '../runtime/runtime-status.service';
import { InMemorySubscriberStore } from '../subscribers/in-memory-subscriber.store';
import { SubscriberRegistryService } from '../subscribers/subscriber-registry.service';

type MetricsStub = {
  readonly incCycles: ReturnType<typeof vi.fn>;
  readonly incFetchFailures: ReturnType<typeof vi.fn>;
  readonly incDetected: ReturnType<typeof vi.fn>;
  readonly service: MetricsService;
};

type DispatcherStub = {
  readonly dispatchBatch: ReturnType<typeof vi.fn>;
  readonly sendSystemMessage: ReturnType<typeof vi.fn>;
};

type OrchestratorHarness = {
  readonly orchestrator: PollOrchestratorService;
  readonly registry: SubscriberRegistryService;
  readonly runtime: RuntimeStatusService;
  readonly dispatcher: DispatcherStub;
  readonly metrics: MetricsStub;
};

const DEFAULT_THRESHOLDS: ReadonlyMap<NetworkKey, INetworkThreshold> = new Map<
  NetworkKey,
  INetworkThreshold
>([
  [NetworkKey.TON, { unit: ThresholdUnit.NATIVE, value: 1000 }],
  [NetworkKey.EVERSCALE, { unit: ThresholdUnit.NATIVE, value: 100_000 }],
  [NetworkKey.VENOM, { unit: ThresholdUnit.NATIVE, value: 0 }],
]);

const orchestrators: PollOrchestratorService[] = [];

const buildTransaction = (
  network: NetworkKey,
  txHash: string,
  amountNative: number,
  amountUsd: number | null = null,
): ITransactionRecord => ({
  network,
  txHash,
  amountNative,
  amountUsd,
  priceVerified: amountUsd !== null,
  sender: '0:sender',
  receiver: '0:receiver',
  timestamp: 1_700_000_000,
});

const createMonitorStub = (
  networkKey: NetworkKey,
  fetchAndFilter: ReturnType<typeof vi.fn>,
): INetworkMonitor => ({
  networkKey,
  displayName: networkKey,
  fetchLatestTransactions: vi.fn(),
  fetchAndFilter,
  fetchRecentAnyAmount: vi.fn(),
  getCurrentPrice: vi.fn(),
});

const createMetricsStub = (): MetricsStub => {
  const incCycles: ReturnType<typeof vi.fn> = vi.fn();
  const incFetchFailures: ReturnType<typeof vi.fn> = vi.fn();
  const incDetected: ReturnType<typeof vi.fn> = vi.fn();

  return {
    incCycles,
    incFetchFailures,
    incDetected,
    service: {
      pollCyclesTotal: { inc: incCycles },
      pollCycleDurationSeconds: { startTimer: vi.fn().mockReturnValue(vi.fn()) },
      monitorFetchFailuresTotal: { inc: incFetchFailures },
      transactionsDetectedTotal: { inc: incDetected },
      enabledSubscribers: { set: vi.fn() },
    } as unknown as MetricsService,
  };
};

const createHarness = async (
  monitors: readonly INetworkMonitor[],
  monitorFetchTimeoutMs: number = 1000,
): Promise<OrchestratorHarness> => {
  const configStub: AppConfigService = {
    alertMode: AlertMode.PER_SUBSCRIBER,
    telegramChatId: '100',
    networkThresholds: DEFAULT_THRESHOLDS,
    usdUnpricedPolicy: UnpricedUsdPolicy.SUPPRESS,
    monitorFetchTimeoutMs,
    pollIntervalSec: 60,
  } as unknown as AppConfigService;
  const metrics: MetricsStub = createMetricsStub();
  const registry: SubscriberRegistryService = new SubscriberRegistryService(
    new InMemorySubscriberStore(),
    configStub,
    metrics.service,
  );
  await registry.onModuleInit();

  const runtime: RuntimeStatusService = new RuntimeStatusService();
  const dispatcher: DispatcherStub = {
    dispatchBatch: vi.fn().mockResolvedValue({ sent: 0, failed: 0, skipped: 0 }),
    sendSystemMessage: vi.fn().mockResolvedValue(true),
  };
  const formatterStub: AlertMessageFormatter = {
    formatError: (message: string): string => `error:${message}`,
    formatStartup: (): string => 'started',
  } as unknown as AlertMessageFormatter;

  const orchestrator: PollOrchestratorService = new PollOrchestratorService(
    monitors,
    registry,
    dispatcher as unknown as NotificationDispatcherService,
    formatterStub,
    runtime,
    metrics.service,
    configStub,
  );
  orchestrators.push(orchestrator);

  return { orchestrator, registry, runtime, dispatcher, metrics };
};

describe('PollOrchestratorService', (): void => {
  afterEach(async (): Promise<void> => {
    await Promise.all(
      orchestrators
        .splice(0)
        .map(async (orchestrator: PollOrchestratorService): Promise<void> => orchestrator.stop()),
    );
  });

  it('isolates a failing network and dispatches the others in order', async (): Promise<void> => {
    const tonTransaction: ITransactionRecord = buildTransaction(NetworkKey.TON, 't1', 5000);
    const venomTransaction: ITransactionRecord = buildTransaction(NetworkKey.VENOM, 'v1', 10);
    const tonFetch: ReturnType<typeof vi.fn> = vi.fn().mockResolvedValue([tonTransaction]);
    const harness: OrchestratorHarness = await createHarness([
      createMonitorStub(NetworkKey.TON, tonFetch),
      createMonitorStub(
        NetworkKey.EVERSCALE,
        vi
          .fn()
          .mockRejectedValue(
            new SourceUnavailableError(
              NetworkKey.EVERSCALE,
              SourceFailureReason.HTTP_STATUS,
              'POST x returned 502',
            ),
          ),
      ),
      createMonitorStub(NetworkKey.VENOM, vi.fn().mockResolvedValue([venomTransaction])),
    ]);
    await harness.registry.enable('200');

    const report: PollCycleReport = await harness.orchestrator.runCycle();

    expect(tonFetch).toHaveBeenCalledWith(
      { unit: ThresholdUnit.NATIVE, value: 1000 },
      expect.any(AbortSignal),
    );
    expect(report.outcomes).toEqual([
      { network: NetworkKey.TON, ok: true, transactions: [tonTransaction] },
      {
        network: NetworkKey.EVERSCALE,
        ok: false,
        errorMessage: 'everscale source unavailable reason=http_status: POST x returned 502',
      },
      { network: NetworkKey.VENOM, ok: true, transactions: [venomTransaction] },
    ]);
    expect(harness.dispatcher.dispatchBatch).toHaveBeenCalledWith(
      [
        { destination: '200', transaction: tonTransaction },
        { destination: '200', transaction: venomTransaction },
      ],
      undefined,
    );
    expect(harness.runtime.getNetworkEntry(NetworkKey.EVERSCALE)?.state).toBe(
      NetworkCycleState.FAILED,
    );
    expect(harness.runtime.getNetworkEntry(NetworkKey.TON)?.lastNewTransactions).toBe(1);
    expect(harness.metrics.incFetchFailures).toHaveBeenCalledTimes(1);
    expect(harness.metrics.incFetchFailures).toHaveBeenCalledWith({
      network: NetworkKey.EVERSCALE,
      reason: SourceFailureReason.HTTP_STATUS,
    });
  });

  it('times out a hanging network without blocking the cycle', async (): Promise<void> => {
    const harness: OrchestratorHarness = await createHarness(
      [
        createMonitorStub(
          NetworkKey.TON,
          vi.fn().mockReturnValue(new Promise<never>((): void => undefined)),
        ),
      ],
      20,
    );
    await harness.registry.enable('200');

    const report: PollCycleReport = await harness.orchestrator.runCycle();

    expect(report.outcomes).toEqual([
      {
        network: NetworkKey.TON,
        ok: false,
        errorMessage: 'fetch network=ton timed out after 20ms',
      },
    ]);
    expect(harness.metrics.incFetchFailures).toHaveBeenCalledWith({
      network: NetworkKey.TON,
      reason: 'timeout',
    });
  });

  it('aborts the fetch signal of a network that misses the deadline', async (): Promise<void> => {
    const tonFetch: ReturnType<typeof vi.fn> = vi
      .fn()
      .mockReturnValue(new Promise<never>((): void => undefined));
    const harness: OrchestratorHarness = await createHarness(
      [createMonitorStub(NetworkKey.TON, tonFetch)],
      20,
    );
    await harness.registry.enable('200');

    await harness.orchestrator.runCycle();

    const signal: unknown = tonFetch.mock.calls[0]?.[1];
    if (!(signal instanceof AbortSignal)) {
      throw new Error('fetchAndFilter received no abort signal');
    }
    expect(signal.aborted).toBe(true);
    expect(signal.reason).toBeInstanceOf(OperationTimeoutError);
  });

  it('aborts in-flight fetches when the cycle is stopped', async (): Promise<void> => {
    const cycleController: AbortController = new AbortController();
    const fetchSignals: AbortSignal[] = [];
    const tonFetch: ReturnType<typeof vi.fn> = vi
      .fn()
      .mockImplementation(
        async (
          _threshold: INetworkThreshold | null,
          signal: AbortSignal,
        ): Promise<readonly ITransactionRecord[]> => {
          fetchSignals.push(signal);
          cycleController.abort();
          return [];
        },
      );
    const harness: OrchestratorHarness = await createHarness([
      createMonitorStub(NetworkKey.TON, tonFetch),
    ]);
    await harness.registry.enable('200');

    const report: PollCycleReport = await harness.orchestrator.runCycle(cycleController.signal);

    expect(report.skipReason).toBe(CycleSkipReason.STOPPED);
    expect(fetchSignals).toHaveLength(1);
    expect(fetchSignals[0]?.aborted).toBe(true);
    expect(harness.dispatcher.dispatchBatch).not.toHaveBeenCalled();
  });

  it('applies each subscriber threshold during fan-out', async (): Promise<void> => {
    const transaction: ITransactionRecord = buildTransaction(NetworkKey.TON, 't1', 5000, 80);
    const tonFetch: ReturnType<typeof vi.fn> = vi.fn().mockResolvedValue([transaction]);
    const harness: OrchestratorHarness = await createHarness([
      createMonitorStub(NetworkKey.TON, tonFetch),
    ]);
    await harness.registry.enable('200');
    await harness.registry.setThreshold('200', NetworkKey.TON, {
      unit: ThresholdUnit.USD,
      value: 100,
    });
    await harness.registry.enable('300');

    await harness.orchestrator.runCycle();

    expect(tonFetch).toHaveBeenCalledWith(null, expect.any(AbortSignal));
    expect(harness.dispatcher.dispatchBatch).toHaveBeenCalledWith(
      [{ destination: '300', transaction }],
      undefined,
    );
  });

  it('skips the cycle when nobody is subscribed', async (): Promise<void> => {
    const tonFetch: ReturnType<typeof vi.fn> = vi.fn();
    const harness: OrchestratorHarness = await createHarness([
      createMonitorStub(NetworkKey.TON, tonFetch),
    ]);

    const report: PollCycleReport = await harness.orchestrator.runCycle();

    expect(report.skipReason).toBe(CycleSkipReason.NO_SUBSCRIBERS);
    expect(tonFetch).not.toHaveBeenCalled();
    expect(harness.dispatcher.dispatchBatch).not.toHaveBeenCalled();
  });

  it('does not dispatch when stopped during the fetch', async (): Promise<void> => {
    const controller: AbortController = new AbortController();
    const harness: OrchestratorHarness = await createHarness([
      createMonitorStub(
        NetworkKey.TON,
        vi.fn().mockImplementation(async (): Promise<readonly ITransactionRecord[]> => {
          controller.abort();
          return [buildTransaction(NetworkKey.TON, 't1', 5000)];
        }),
      ),
    ]);
    await harness.registry.enable('200');

    const report: PollCycleReport = await harness.orchestrator.runCycle(controller.signal);

    expect(report.skipReason).toBe(CycleSkipReason.STOPPED);
    expect(harness.dispatcher.dispatchBatch).not.toHaveBeenCalled();
  });

  it('announces startup, runs the loop and stops cooperatively', async (): Promise<void> => {
    const harness: OrchestratorHarness = await createHarness([
      createMonitorStub(NetworkKey.TON, vi.fn().mockResolvedValue([])),
    ]);
    await harness.registry.enable('200');

    await harness.orchestrator.onApplicationBootstrap();
    await vi.waitFor((): void => {
      expect(harness.metrics.incCycles).toHaveBeenCalledWith({ status: 'ok' });
    });
    await harness.orchestrator.stop();

    expect(harness.dispatcher.sendSystemMessage).toHaveBeenCalledWith('100', 'started');
    expect(harness.orchestrator.getState()).toBe(OrchestratorState.STOPPED);
    expect(harness.runtime.getTelemetry().cycle.completedCycles).toBe(1);
  });

  it('reports an unexpected cycle error and keeps the loop alive', async (): Promise<void> => {
    const harness: OrchestratorHarness = await createHarness([
      createMonitorStub(NetworkKey.TON, vi.fn().mockResolvedValue([])),
    ]);
    await harness.registry.enable('200');
    harness.dispatcher.dispatchBatch.mockRejectedValueOnce(new Error('sink exploded'));

    harness.orchestrator.start();
    await vi.waitFor((): void => {
      expect(harness.dispatcher.sendSystemMessage).toHaveBeenCalledWith(
        '100',
        'error:poll cycle failed: sink exploded',
      );
    });

    await harness.orchestrator.stop();

    expect(harness.runtime.getTelemetry().cycle.lastCycleError).toBe('sink exploded');
    expect(harness.metrics.incCycles).toHaveBeenCalledWith({ status: 'error' });
  });
});
