import { Injectable, Logger, type OnModuleDestroy } from '@nestjs/common';
import Bottleneck from 'bottleneck';

import {
  type IBottleneckConfig,
  type ILimiterQueueSnapshot,
  LimiterKey,
  RequestPriority,
} from './bottleneck-rate-limiter.interfaces';
import { buildLimiterConfigs } from './rate-limiter-config.factory';
import { AppConfigService } from '../config/app-config.service';

@Injectable()
export class BottleneckRateLimiterService implements OnModuleDestroy {
  private readonly logger: Logger = new Logger(BottleneckRateLimiterService.name);
  private readonly limiters: ReadonlyMap<LimiterKey, Bottleneck>;

  public constructor(appConfigService: AppConfigService) {
    const limiters: Map<LimiterKey, Bottleneck> = new Map<LimiterKey, Bottleneck>();

    for (const [key, config] of buildLimiterConfigs(appConfigService)) {
      limiters.set(key, this.createLimiter(key, config));
    }

    this.limiters = limiters;
  }

  /**
   * Runs `operation` through the limiter for `key`. Lower priority numbers leave the
   * queue first; jobs of equal priority keep submission order.
   */
  public async schedule<T>(
    key: LimiterKey,
    operation: () => Promise<T>,
    priority: RequestPriority = RequestPriority.NORMAL,
  ): Promise<T> {
    const limiter: Bottleneck | undefined = this.limiters.get(key);

    if (limiter === undefined) {
      throw new Error(`No rate limiter configured for key=${key}`);
    }

    const queuedAtMs: number = Date.now();

    return limiter.schedule({ priority }, async (): Promise<T> => {
      this.logger.debug(
        `limiter job start key=${key} priority=${String(priority)} waitedMs=${String(Date.now() - queuedAtMs)}`,
      );
      return operation();
    });
  }

  public snapshotQueues(): readonly ILimiterQueueSnapshot[] {
    return [...this.limiters].map(
      ([key, limiter]: [LimiterKey, Bottleneck]): ILimiterQueueSnapshot => {
        const counts: Bottleneck.Counts = limiter.counts();

        return {
          key,
          queueSize: counts.QUEUED + counts.RECEIVED,
          running: counts.RUNNING + counts.EXECUTING,
        };
      },
    );
  }

  // Waiting jobs are dropped so shutdown does not sit behind paced notifications.
  public async onModuleDestroy(): Promise<void> {
    await Promise.allSettled(
      [...this.limiters].map(
        async ([key, limiter]: [LimiterKey, Bottleneck]): Promise<void> => {
          try {
            await limiter.stop({ dropWaitingJobs: true });
            this.logger.log(`Rate limiter stopped key=${key}`);
          } catch (error: unknown) {
            const message: string = error instanceof Error ? error.message : String(error);
            this.logger.error(`Failed to stop rate limiter key=${key}: ${message}`);
          }
        },
      ),
    );
  }

  private createLimiter(key: LimiterKey, config: IBottleneckConfig): Bottleneck {
    const limiter: Bottleneck = new Bottleneck({
      id: key,
      minTime: config.minTime,
      maxConcurrent: config.maxConcurrent,
    });

    limiter.on('error', (error: unknown): void => {
      const message: string = error instanceof Error ? error.message : String(error);
      this.logger.error(`Bottleneck error limiter=${key}: ${message}`);
    });

    limiter.on('dropped', (): void => {
      this.logger.warn(`Request dropped from queue limiter=${key}`);
    });

    return limiter;
  }
}
