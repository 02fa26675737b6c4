import { Injectable } from '@nestjs/common';
import { collectDefaultMetrics, Counter, Gauge, Histogram, Registry } from 'prom-client';

// Histogram bucket boundaries in seconds for poll cycle duration
/* eslint-disable no-magic-numbers */
const POLL_CYCLE_DURATION_BUCKETS: number[] = [0.25, 0.5, 1, 2.5, 5, 10, 15, 30, 60];
/* eslint-enable no-magic-numbers */

@Injectable()
export class MetricsService {
  private readonly registry: Registry;

  public readonly pollCyclesTotal: Counter<'status'>;
  public readonly pollCycleDurationSeconds: Histogram;
  public readonly monitorFetchFailuresTotal: Counter<'network' | 'reason'>;
  public readonly transactionsDetectedTotal: Counter<'network'>;
  public readonly notificationsTotal: Counter<'kind' | 'status'>;
  public readonly priceRefreshFailuresTotal: Counter<'network' | 'reason'>;
  public readonly enabledSubscribers: Gauge;
  public readonly rateLimitQueueSize: Gauge<'limiter'>;
  public readonly networkConsecutiveFailures: Gauge<'network'>;

  public constructor() {
    this.registry = new Registry();

    collectDefaultMetrics({ register: this.registry });

    this.pollCyclesTotal = new Counter({
      name: 'poll_cycles_total',
      help: 'Total number of completed poll cycles',
      labelNames: ['status'] as const,
      registers: [this.registry],
    });

    this.pollCycleDurationSeconds = new Histogram({
      name: 'poll_cycle_duration_seconds',
      help: 'Poll cycle duration in seconds',
      buckets: POLL_CYCLE_DURATION_BUCKETS,
      registers: [this.registry],
    });

    this.monitorFetchFailuresTotal = new Counter({
      name: 'monitor_fetch_failures_total',
      help: 'Total number of failed network fetches',
      labelNames: ['network', 'reason'] as const,
      registers: [this.registry],
    });

    this.transactionsDetectedTotal = new Counter({
      name: 'transactions_detected_total',
      help: 'Total number of new transactions returned by monitors',
      labelNames: ['network'] as const,
      registers: [this.registry],
    });

    this.notificationsTotal = new Counter({
      name: 'notifications_total',
      help: 'Total number of notification attempts',
      labelNames: ['kind', 'status'] as const,
      registers: [this.registry],
    });

    this.priceRefreshFailuresTotal = new Counter({
      name: 'price_refresh_failures_total',
      help: 'Total number of failed price refreshes',
      labelNames: ['network', 'reason'] as const,
      registers: [this.registry],
    });

    this.enabledSubscribers = new Gauge({
      name: 'enabled_subscribers',
      help: 'Number of subscribers with alerts enabled',
      registers: [this.registry],
    });

    this.rateLimitQueueSize = new Gauge({
      name: 'rate_limit_queue_size',
      help: 'Current queue size for rate limiter',
      labelNames: ['limiter'] as const,
      registers: [this.registry],
    });

    this.networkConsecutiveFailures = new Gauge({
      name: 'network_consecutive_failures',
      help: 'Consecutive failed fetch cycles per network',
      labelNames: ['network'] as const,
      registers: [this.registry],
    });
  }

  public async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  public getContentType(): string {
    return this.registry.contentType;
  }
}
