import {
  Inject,
  Injectable,
  Logger,
  type OnApplicationBootstrap,
  type OnModuleDestroy,
} from '@nestjs/common';

import {
  CycleSkipReason,
  type NetworkFetchOutcome,
  OrchestratorState,
  type PollCycleReport,
} from './poll-orchestrator.interfaces';
import { AlertMessageFormatter } from '../alerts/alert-message.formatter';
import type { AlertJob, DispatchSummary } from '../alerts/alert.interfaces';
import { NotificationDispatcherService } from '../alerts/notification-dispatcher.service';
import { abortableSleep } from '../common/utils/async/abortable-sleep.util';
import { OperationTimeoutError, withTimeout } from '../common/utils/async/with-timeout.util';
import { AppConfigService } from '../config/app-config.service';
import { SourceUnavailableError } from '../core/errors/monitoring.errors';
import { NETWORK_MONITORS } from '../core/ports/monitors/network-monitor-port.tokens';
import type { INetworkMonitor } from '../core/ports/monitors/network-monitor.interfaces';
import type { ISubscriberRecord } from '../core/ports/subscribers/subscriber-store.interfaces';
import type {
  INetworkThreshold,
  ITransactionRecord,
} from '../core/transactions/transaction.interfaces';
import { passesThreshold } from '../monitoring/filters/transaction-filter.util';
import { MetricsService } from '../observability/metrics.service';
import { RuntimeStatusService } from '../runtime/runtime-status.service';
import { SubscriberRegistryService } from '../subscribers/subscriber-registry.service';

const EMPTY_DISPATCH: DispatchSummary = { sent: 0, failed: 0, skipped: 0 };

const resolveFailureReason = (error: unknown): string => {
  if (error instanceof SourceUnavailableError) {
    return error.reason;
  }

  if (error instanceof OperationTimeoutError) {
    return 'timeout';
  }

  return 'unknown';
};

/**
 * Poll loop: `idle -> polling -> dispatching -> sleeping -> polling ...` until stopped.
 * Cycles start on fixed interval boundaries measured from the previous cycle start.
 */
@Injectable()
export class PollOrchestratorService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger: Logger = new Logger(PollOrchestratorService.name);
  private state: OrchestratorState = OrchestratorState.IDLE;
  private stopController: AbortController | null = null;
  private loopPromise: Promise<void> | null = null;

  public constructor(
    @Inject(NETWORK_MONITORS) private readonly monitors: readonly INetworkMonitor[],
    private readonly subscriberRegistry: SubscriberRegistryService,
    private readonly notificationDispatcher: NotificationDispatcherService,
    private readonly alertMessageFormatter: AlertMessageFormatter,
    private readonly runtimeStatusService: RuntimeStatusService,
    private readonly metricsService: MetricsService,
    private readonly appConfigService: AppConfigService,
  ) {
    for (const monitor of monitors) {
      this.runtimeStatusService.registerNetwork(monitor.networkKey);
    }
  }

  public getState(): OrchestratorState {
    return this.state;
  }

  public start(): void {
    if (this.loopPromise !== null) {
      return;
    }

    const controller: AbortController = new AbortController();
    this.stopController = controller;
    this.loopPromise = this.runLoop(controller.signal);
    this.logger.log(
      `poll loop started networks=${this.monitors.length.toString()} intervalSec=${String(this.appConfigService.pollIntervalSec)}`,
    );
  }

  public async stop(): Promise<void> {
    this.stopController?.abort();
    await this.loopPromise;
    this.loopPromise = null;
    this.stopController = null;
    this.state = OrchestratorState.STOPPED;
  }

  public async onApplicationBootstrap(): Promise<void> {
    const operatorChatId: string | null = this.appConfigService.telegramChatId;

    if (operatorChatId !== null) {
      await this.notificationDispatcher.sendSystemMessage(
        operatorChatId,
        this.alertMessageFormatter.formatStartup(),
      );
    }

    this.start();
  }

  public async onModuleDestroy(): Promise<void> {
    await this.stop();
  }

  public async runCycle(signal?: AbortSignal): Promise<PollCycleReport> {
    if (signal?.aborted === true) {
      return this.buildSkippedReport(CycleSkipReason.STOPPED);
    }

    const subscribers: readonly ISubscriberRecord[] =
      this.subscriberRegistry.listEnabledSubscribers();

    if (subscribers.length === 0) {
      this.logger.debug('cycle skipped no enabled subscribers');
      return this.buildSkippedReport(CycleSkipReason.NO_SUBSCRIBERS);
    }

    this.state = OrchestratorState.POLLING;
    const outcomes: readonly NetworkFetchOutcome[] = await this.fetchAll(subscribers, signal);

    if (signal?.aborted) {
      return { skipReason: CycleSkipReason.STOPPED, outcomes, dispatch: EMPTY_DISPATCH };
    }

    this.state = OrchestratorState.DISPATCHING;
    const jobs: readonly AlertJob[] = this.buildJobs(outcomes, subscribers);
    const dispatch: DispatchSummary = await this.notificationDispatcher.dispatchBatch(
      jobs,
      signal,
    );

    return { skipReason: null, outcomes, dispatch };
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    const intervalMs: number = this.appConfigService.pollIntervalSec * 1000;

    while (!signal.aborted) {
      const startedAtMs: number = Date.now();
      await this.runTrackedCycle(startedAtMs, signal);

      this.state = OrchestratorState.SLEEPING;
      await abortableSleep(intervalMs - (Date.now() - startedAtMs), signal);
    }

    this.state = OrchestratorState.STOPPED;
    this.logger.log('poll loop stopped');
  }

  private async runTrackedCycle(startedAtMs: number, signal: AbortSignal): Promise<void> {
    const endTimer: () => number = this.metricsService.pollCycleDurationSeconds.startTimer();

    try {
      const report: PollCycleReport = await this.runCycle(signal);
      this.runtimeStatusService.recordCycle(startedAtMs, Date.now() - startedAtMs, null);
      this.metricsService.pollCyclesTotal.inc({ status: report.skipReason ?? 'ok' });
    } catch (error: unknown) {
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      this.logger.error(`cycle failed reason=${errorMessage}`);
      this.runtimeStatusService.recordCycle(startedAtMs, Date.now() - startedAtMs, errorMessage);
      this.metricsService.pollCyclesTotal.inc({ status: 'error' });
      await this.reportCycleError(errorMessage);
    } finally {
      endTimer();
    }
  }

  private async fetchAll(
    subscribers: readonly ISubscriberRecord[],
    cycleSignal?: AbortSignal,
  ): Promise<readonly NetworkFetchOutcome[]> {
    const timeoutMs: number = this.appConfigService.monitorFetchTimeoutMs;
    const settled: readonly PromiseSettledResult<readonly ITransactionRecord[]>[] =
      await Promise.allSettled(
        this.monitors.map(
          async (monitor: INetworkMonitor): Promise<readonly ITransactionRecord[]> => {
            const fetchController: AbortController = new AbortController();
            const fetchSignal: AbortSignal =
              cycleSignal === undefined
                ? fetchController.signal
                : AbortSignal.any([cycleSignal, fetchController.signal]);

            return withTimeout(
              monitor.fetchAndFilter(
                this.resolveFetchThreshold(monitor, subscribers),
                fetchSignal,
              ),
              timeoutMs,
              `fetch network=${monitor.networkKey}`,
              fetchController,
            );
          },
        ),
      );

    return this.monitors.map((monitor: INetworkMonitor, index: number): NetworkFetchOutcome => {
      const result: PromiseSettledResult<readonly ITransactionRecord[]> | undefined =
        settled[index];

      if (result?.status === 'fulfilled') {
        this.runtimeStatusService.recordNetworkSuccess(monitor.networkKey, result.value.length);
        this.metricsService.transactionsDetectedTotal.inc(
          { network: monitor.networkKey },
          result.value.length,
        );
        return { network: monitor.networkKey, ok: true, transactions: result.value };
      }

      const error: unknown = result?.reason;
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      this.logger.warn(
        `network fetch failed network=${monitor.networkKey} reason=${errorMessage}`,
      );
      this.runtimeStatusService.recordNetworkFailure(monitor.networkKey, errorMessage);
      this.metricsService.monitorFetchFailuresTotal.inc({
        network: monitor.networkKey,
        reason: resolveFailureReason(error),
      });

      return { network: monitor.networkKey, ok: false, errorMessage };
    });
  }

  // One shared threshold when every enabled subscriber resolves to the same value.
  private resolveFetchThreshold(
    monitor: INetworkMonitor,
    subscribers: readonly ISubscriberRecord[],
  ): INetworkThreshold | null {
    const [first, ...rest] = subscribers.map(
      (subscriber: ISubscriberRecord): INetworkThreshold | null =>
        this.subscriberRegistry.resolveThreshold(subscriber, monitor.networkKey),
    );

    if (first === undefined || first === null) {
      return null;
    }

    const shared: boolean = rest.every(
      (threshold: INetworkThreshold | null): boolean =>
        threshold !== null && threshold.unit === first.unit && threshold.value === first.value,
    );

    return shared ? first : null;
  }

  private buildJobs(
    outcomes: readonly NetworkFetchOutcome[],
    subscribers: readonly ISubscriberRecord[],
  ): readonly AlertJob[] {
    const jobs: AlertJob[] = [];

    for (const outcome of outcomes) {
      if (!outcome.ok) {
        continue;
      }

      for (const transaction of outcome.transactions) {
        for (const subscriber of subscribers) {
          const threshold: INetworkThreshold | null = this.subscriberRegistry.resolveThreshold(
            subscriber,
            outcome.network,
          );

          if (
            threshold === null ||
            passesThreshold(transaction, threshold, this.appConfigService.usdUnpricedPolicy)
          ) {
            jobs.push({ destination: subscriber.channelId, transaction });
          }
        }
      }
    }

    return jobs;
  }

  private async reportCycleError(errorMessage: string): Promise<void> {
    const operatorChatId: string | null = this.appConfigService.telegramChatId;

    if (operatorChatId === null) {
      return;
    }

    await this.notificationDispatcher.sendSystemMessage(
      operatorChatId,
      this.alertMessageFormatter.formatError(`poll cycle failed: ${errorMessage}`),
    );
  }

  private buildSkippedReport(skipReason: CycleSkipReason): PollCycleReport {
    return { skipReason, outcomes: [], dispatch: EMPTY_DISPATCH };
  }
}
