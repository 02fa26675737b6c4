import { Inject, Injectable, Logger, type OnModuleInit } from '@nestjs/common';

import { AlertMode } from '../config/app-config.types';
import { AppConfigService } from '../config/app-config.service';
import type { NetworkKey } from '../core/networks/network-key.interfaces';
import { SUBSCRIBER_STORE } from '../core/ports/subscribers/subscriber-store-port.tokens';
import type {
  ISubscriberRecord,
  ISubscriberStore,
  ThresholdOverrides,
} from '../core/ports/subscribers/subscriber-store.interfaces';
import type { INetworkThreshold } from '../core/transactions/transaction.interfaces';
import { MetricsService } from '../observability/metrics.service';

/**
 * Owns the subscriber list. Reads return the last committed snapshot; every mutation
 * goes through {@link SubscriberRegistryService.runExclusive}, so commands and the poll
 * loop never observe a half-applied change.
 */
@Injectable()
export class SubscriberRegistryService implements OnModuleInit {
  private readonly logger: Logger = new Logger(SubscriberRegistryService.name);
  private snapshot: ReadonlyMap<string, ISubscriberRecord> = new Map<string, ISubscriberRecord>();
  private writeQueue: Promise<void> = Promise.resolve();

  public constructor(
    @Inject(SUBSCRIBER_STORE) private readonly subscriberStore: ISubscriberStore,
    private readonly appConfigService: AppConfigService,
    private readonly metricsService: MetricsService,
  ) {}

  public async onModuleInit(): Promise<void> {
    await this.runExclusive(async (): Promise<void> => {
      const records: readonly ISubscriberRecord[] = await this.subscriberStore.loadAll();
      const loaded: Map<string, ISubscriberRecord> = new Map<string, ISubscriberRecord>();

      for (const record of records) {
        loaded.set(record.channelId, record);
      }

      this.commit(loaded);
      this.logger.log(`subscribers loaded count=${String(loaded.size)}`);
    });

    const operatorChatId: string | null = this.appConfigService.telegramChatId;

    if (this.appConfigService.alertMode === AlertMode.GLOBAL && operatorChatId !== null) {
      await this.runExclusive(async (): Promise<void> => {
        if (!this.snapshot.has(operatorChatId)) {
          await this.persist(this.createRecord(operatorChatId));
        }
      });
    }
  }

  public isAuthorized(channelId: string): boolean {
    if (this.appConfigService.alertMode === AlertMode.PER_SUBSCRIBER) {
      return true;
    }

    return channelId === this.appConfigService.telegramChatId;
  }

  public getSubscriber(channelId: string): ISubscriberRecord | null {
    return this.snapshot.get(channelId) ?? null;
  }

  public listEnabledSubscribers(): readonly ISubscriberRecord[] {
    return [...this.snapshot.values()].filter(
      (record: ISubscriberRecord): boolean => record.enabled,
    );
  }

  public resolveThreshold(
    subscriber: ISubscriberRecord | null,
    networkKey: NetworkKey,
  ): INetworkThreshold | null {
    return (
      subscriber?.thresholds[networkKey] ??
      this.appConfigService.networkThresholds.get(networkKey) ??
      null
    );
  }

  public async enable(channelId: string): Promise<ISubscriberRecord> {
    return this.runExclusive(async (): Promise<ISubscriberRecord> => {
      const existing: ISubscriberRecord | undefined = this.snapshot.get(channelId);

      if (existing === undefined) {
        return this.persist(this.createRecord(channelId));
      }

      if (existing.enabled) {
        return existing;
      }

      return this.persist({ ...existing, enabled: true, updatedAt: new Date() });
    });
  }

  public async disable(channelId: string): Promise<ISubscriberRecord | null> {
    return this.runExclusive(async (): Promise<ISubscriberRecord | null> => {
      const existing: ISubscriberRecord | undefined = this.snapshot.get(channelId);

      if (existing === undefined) {
        return null;
      }

      if (!existing.enabled) {
        return existing;
      }

      return this.persist({ ...existing, enabled: false, updatedAt: new Date() });
    });
  }

  public async setThreshold(
    channelId: string,
    networkKey: NetworkKey,
    threshold: INetworkThreshold,
  ): Promise<ISubscriberRecord> {
    return this.runExclusive(async (): Promise<ISubscriberRecord> => {
      const existing: ISubscriberRecord =
        this.snapshot.get(channelId) ?? this.createRecord(channelId);
      const thresholds: ThresholdOverrides = {
        ...existing.thresholds,
        [networkKey]: threshold,
      };

      return this.persist({ ...existing, thresholds, updatedAt: new Date() });
    });
  }

  private async runExclusive<T>(mutation: () => Promise<T>): Promise<T> {
    const resultPromise: Promise<T> = this.writeQueue
      .catch((): void => undefined)
      .then(async (): Promise<T> => mutation());

    this.writeQueue = resultPromise.then(
      (): void => undefined,
      (error: unknown): void => {
        const errorMessage: string = error instanceof Error ? error.message : String(error);
        this.logger.warn(`subscriber mutation failed reason=${errorMessage}`);
      },
    );

    return resultPromise;
  }

  // Store first: a failed write leaves the snapshot untouched.
  private async persist(record: ISubscriberRecord): Promise<ISubscriberRecord> {
    await this.subscriberStore.save(record);

    const next: Map<string, ISubscriberRecord> = new Map<string, ISubscriberRecord>(this.snapshot);
    next.set(record.channelId, record);
    this.commit(next);
    this.logger.log(
      `subscriber saved channelId=${record.channelId} enabled=${String(record.enabled)}`,
    );

    return record;
  }

  private commit(next: ReadonlyMap<string, ISubscriberRecord>): void {
    this.snapshot = next;
    this.metricsService.enabledSubscribers.set(this.listEnabledSubscribers().length);
  }

  private createRecord(channelId: string): ISubscriberRecord {
    const now: Date = new Date();

    return {
      channelId,
      enabled: true,
      thresholds: {},
      createdAt: now,
      updatedAt: now,
    };
  }
}
