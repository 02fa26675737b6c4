import {
  Inject,
  Injectable,
  Logger,
  type OnApplicationBootstrap,
  type OnModuleDestroy,
} from '@nestjs/common';

import { AlertMessageFormatter } from '../alerts/alert-message.formatter';
import { type IDashboardSection, NotificationKind } from '../alerts/alert.interfaces';
import { NotificationDispatcherService } from '../alerts/notification-dispatcher.service';
import { abortableSleep } from '../common/utils/async/abortable-sleep.util';
import { AppConfigService } from '../config/app-config.service';
import { NETWORK_MONITORS } from '../core/ports/monitors/network-monitor-port.tokens';
import type { INetworkMonitor } from '../core/ports/monitors/network-monitor.interfaces';
import type { ISubscriberRecord } from '../core/ports/subscribers/subscriber-store.interfaces';
import type { ITransactionRecord } from '../core/transactions/transaction.interfaces';
import { SubscriberRegistryService } from '../subscribers/subscriber-registry.service';

@Injectable()
export class DashboardReporterService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger: Logger = new Logger(DashboardReporterService.name);
  private reportInFlight: Promise<string> | null = null;
  private stopController: AbortController | null = null;
  private loopPromise: Promise<void> | null = null;

  public constructor(
    @Inject(NETWORK_MONITORS) private readonly monitors: readonly INetworkMonitor[],
    private readonly subscriberRegistry: SubscriberRegistryService,
    private readonly notificationDispatcher: NotificationDispatcherService,
    private readonly alertMessageFormatter: AlertMessageFormatter,
    private readonly appConfigService: AppConfigService,
  ) {}

  public onApplicationBootstrap(): void {
    if (!this.appConfigService.dashboardEnabled) {
      this.logger.log('dashboard disabled by config');
      return;
    }

    this.start();
  }

  public async onModuleDestroy(): Promise<void> {
    await this.stop();
  }

  public start(): void {
    if (this.loopPromise !== null) {
      return;
    }

    const controller: AbortController = new AbortController();
    this.stopController = controller;
    this.loopPromise = this.runLoop(controller.signal);
    this.logger.log(
      `dashboard started intervalSec=${String(this.appConfigService.dashboardIntervalSec)}`,
    );
  }

  public async stop(): Promise<void> {
    this.stopController?.abort();
    await this.loopPromise;
    this.loopPromise = null;
    this.stopController = null;
  }

  /** Concurrent callers share one build. */
  public async buildReport(): Promise<string> {
    if (this.reportInFlight !== null) {
      return this.reportInFlight;
    }

    this.reportInFlight = this.collectReport().finally((): void => {
      this.reportInFlight = null;
    });

    return this.reportInFlight;
  }

  public async publish(): Promise<number> {
    const subscribers: readonly ISubscriberRecord[] =
      this.subscriberRegistry.listEnabledSubscribers();

    if (subscribers.length === 0) {
      this.logger.debug('dashboard skipped no enabled subscribers');
      return 0;
    }

    const report: string = await this.buildReport();
    let delivered: number = 0;

    for (const subscriber of subscribers) {
      const sent: boolean = await this.notificationDispatcher.sendSystemMessage(
        subscriber.channelId,
        report,
        NotificationKind.DASHBOARD,
      );

      if (sent) {
        delivered += 1;
      }
    }

    this.logger.log(
      `dashboard published delivered=${String(delivered)} subscribers=${String(subscribers.length)}`,
    );

    return delivered;
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    const intervalMs: number = this.appConfigService.dashboardIntervalSec * 1000;

    while (!signal.aborted) {
      await abortableSleep(intervalMs, signal);

      if (signal.aborted) {
        break;
      }

      try {
        await this.publish();
      } catch (error: unknown) {
        const errorMessage: string = error instanceof Error ? error.message : String(error);
        this.logger.error(`dashboard tick failed reason=${errorMessage}`);
      }
    }
  }

  private async collectReport(): Promise<string> {
    const limit: number = this.appConfigService.dashboardLimit;
    const settled: readonly PromiseSettledResult<readonly ITransactionRecord[]>[] =
      await Promise.allSettled(
        this.monitors.map(
          async (monitor: INetworkMonitor): Promise<readonly ITransactionRecord[]> =>
            monitor.fetchRecentAnyAmount(limit),
        ),
      );

    const sections: readonly IDashboardSection[] = this.monitors.map(
      (monitor: INetworkMonitor, index: number): IDashboardSection => {
        const result: PromiseSettledResult<readonly ITransactionRecord[]> | undefined =
          settled[index];

        if (result?.status === 'fulfilled') {
          return { networkKey: monitor.networkKey, transactions: result.value.slice(0, limit) };
        }

        const errorMessage: string =
          result?.reason instanceof Error ? result.reason.message : String(result?.reason);
        this.logger.warn(
          `dashboard section failed network=${monitor.networkKey} reason=${errorMessage}`,
        );

        return { networkKey: monitor.networkKey, transactions: [] };
      },
    );

    return this.alertMessageFormatter.formatDashboard(sections, new Date());
  }
}
