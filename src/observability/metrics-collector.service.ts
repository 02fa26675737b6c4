import { Injectable, Logger, type OnModuleDestroy, type OnModuleInit } from '@nestjs/common';

import { MetricsService } from './metrics.service';
import { AppConfigService } from '../config/app-config.service';
import { BottleneckRateLimiterService } from '../rate-limiting/bottleneck-rate-limiter.service';
import { RuntimeStatusService } from '../runtime/runtime-status.service';

const COLLECT_INTERVAL_MS = 10_000;

/** Copies point-in-time state (limiter queues, network failure streaks) into gauges. */
@Injectable()
export class MetricsCollectorService implements OnModuleInit, OnModuleDestroy {
  private readonly logger: Logger = new Logger(MetricsCollectorService.name);
  private intervalHandle: ReturnType<typeof setInterval> | null = null;

  public constructor(
    private readonly metricsService: MetricsService,
    private readonly rateLimiterService: BottleneckRateLimiterService,
    private readonly runtimeStatusService: RuntimeStatusService,
    private readonly appConfigService: AppConfigService,
  ) {}

  public onModuleInit(): void {
    if (!this.appConfigService.metricsEnabled) {
      this.logger.log('Metrics collection disabled');
      return;
    }

    this.intervalHandle = setInterval((): void => {
      this.collect();
    }, COLLECT_INTERVAL_MS);
    this.intervalHandle.unref();

    this.logger.log(`Metrics collector started intervalMs=${String(COLLECT_INTERVAL_MS)}`);
  }

  public onModuleDestroy(): void {
    if (this.intervalHandle !== null) {
      clearInterval(this.intervalHandle);
      this.intervalHandle = null;
    }
  }

  public collect(): void {
    for (const snapshot of this.rateLimiterService.snapshotQueues()) {
      this.metricsService.rateLimitQueueSize.set({ limiter: snapshot.key }, snapshot.queueSize);
    }

    for (const entry of this.runtimeStatusService.listNetworkEntries()) {
      this.metricsService.networkConsecutiveFailures.set(
        { network: entry.network },
        entry.consecutiveFailures,
      );
    }
  }
}
