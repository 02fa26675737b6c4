import { Inject, Injectable, Logger } from '@nestjs/common';

import { AlertMessageFormatter } from './alert-message.formatter';
import { type AlertJob, type DispatchSummary, NotificationKind } from './alert.interfaces';
import { DispatchFailureError } from '../core/errors/monitoring.errors';
import { NOTIFICATION_SINK } from '../core/ports/notifications/notification-sink-port.tokens';
import type { INotificationSink } from '../core/ports/notifications/notification-sink.interfaces';
import type { ITransactionRecord } from '../core/transactions/transaction.interfaces';
import { MetricsService } from '../observability/metrics.service';
import { LimiterKey, RequestPriority } from '../rate-limiting/bottleneck-rate-limiter.interfaces';
import { BottleneckRateLimiterService } from '../rate-limiting/bottleneck-rate-limiter.service';

const PRIORITY_BY_KIND: Readonly<Record<NotificationKind, RequestPriority>> = {
  [NotificationKind.SYSTEM]: RequestPriority.HIGH,
  [NotificationKind.ALERT]: RequestPriority.NORMAL,
  [NotificationKind.DASHBOARD]: RequestPriority.LOW,
};

/**
 * Delivers messages to the notification sink one at a time. Pacing comes from the
 * `TELEGRAM_NOTIFICATIONS` limiter (`maxConcurrent: 1`, `minTime` = minimum interval).
 */
@Injectable()
export class NotificationDispatcherService {
  private readonly logger: Logger = new Logger(NotificationDispatcherService.name);

  public constructor(
    @Inject(NOTIFICATION_SINK) private readonly notificationSink: INotificationSink,
    private readonly alertMessageFormatter: AlertMessageFormatter,
    private readonly rateLimiterService: BottleneckRateLimiterService,
    private readonly metricsService: MetricsService,
  ) {}

  public async send(transaction: ITransactionRecord, destination: string): Promise<void> {
    const message: string = this.alertMessageFormatter.formatTransaction(transaction);
    await this.deliver(destination, message, NotificationKind.ALERT);
    this.logger.log(
      `alert sent destination=${destination} network=${transaction.network} txHash=${transaction.txHash}`,
    );
  }

  public async dispatchBatch(
    jobs: readonly AlertJob[],
    signal?: AbortSignal,
  ): Promise<DispatchSummary> {
    let sent: number = 0;
    let failed: number = 0;

    for (const [index, job] of jobs.entries()) {
      if (signal?.aborted === true) {
        const skipped: number = jobs.length - index;
        this.logger.warn(`dispatch batch interrupted skipped=${String(skipped)}`);
        return { sent, failed, skipped };
      }

      try {
        await this.send(job.transaction, job.destination);
        sent += 1;
      } catch (error: unknown) {
        failed += 1;
        const errorMessage: string = error instanceof Error ? error.message : String(error);
        this.logger.warn(
          `alert delivery failed txHash=${job.transaction.txHash} reason=${errorMessage}`,
        );
      }
    }

    if (jobs.length > 0) {
      this.logger.debug(`dispatch batch complete sent=${String(sent)} failed=${String(failed)}`);
    }

    return { sent, failed, skipped: 0 };
  }

  // Startup, error and dashboard messages; a failure is logged and reported as false.
  public async sendSystemMessage(
    destination: string,
    message: string,
    kind: NotificationKind = NotificationKind.SYSTEM,
  ): Promise<boolean> {
    try {
      await this.deliver(destination, message, kind);
      return true;
    } catch (error: unknown) {
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      this.logger.warn(`${kind} message failed reason=${errorMessage}`);
      return false;
    }
  }

  private async deliver(
    destination: string,
    message: string,
    kind: NotificationKind,
  ): Promise<void> {
    try {
      await this.rateLimiterService.schedule(
        LimiterKey.TELEGRAM_NOTIFICATIONS,
        async (): Promise<void> => this.notificationSink.sendMessage(destination, message),
        PRIORITY_BY_KIND[kind],
      );
    } catch (error: unknown) {
      this.metricsService.notificationsTotal.inc({ kind, status: 'failed' });
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      throw new DispatchFailureError(destination, errorMessage);
    }

    this.metricsService.notificationsTotal.inc({ kind, status: 'sent' });
  }
}
