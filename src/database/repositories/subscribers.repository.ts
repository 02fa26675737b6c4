import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';

import { ALL_NETWORK_KEYS, type NetworkKey } from '../../core/networks/network-key.interfaces';
import type {
  ISubscriberRecord,
  ISubscriberStore,
  ThresholdOverrides,
} from '../../core/ports/subscribers/subscriber-store.interfaces';
import {
  type INetworkThreshold,
  ThresholdUnit,
} from '../../core/transactions/transaction.interfaces';
import { DatabaseService } from '../kysely/database.service';
import type { NewSubscriberRow, SubscriberRow } from '../types/database.types';

const storedThresholdSchema = z.object({
  unit: z.enum(ThresholdUnit),
  value: z.number().nonnegative(),
});

@Injectable()
export class SubscribersRepository implements ISubscriberStore {
  private readonly logger: Logger = new Logger(SubscribersRepository.name);

  public constructor(private readonly databaseService: DatabaseService) {}

  public async loadAll(): Promise<readonly ISubscriberRecord[]> {
    const rows: SubscriberRow[] = await this.databaseService
      .getDb()
      .selectFrom('subscribers')
      .selectAll()
      .orderBy('created_at', 'asc')
      .execute();

    return rows.map((row: SubscriberRow): ISubscriberRecord => this.mapRow(row));
  }

  public async save(record: ISubscriberRecord): Promise<void> {
    const insertRow: NewSubscriberRow = {
      channel_id: record.channelId,
      enabled: record.enabled,
      thresholds: JSON.stringify(record.thresholds),
      created_at: record.createdAt,
      updated_at: record.updatedAt,
    };

    await this.databaseService
      .getDb()
      .insertInto('subscribers')
      .values(insertRow)
      .onConflict((oc) =>
        oc.column('channel_id').doUpdateSet({
          enabled: insertRow.enabled,
          thresholds: insertRow.thresholds,
          updated_at: record.updatedAt,
        }),
      )
      .execute();
  }

  private mapRow(row: SubscriberRow): ISubscriberRecord {
    return {
      channelId: row.channel_id,
      enabled: row.enabled,
      thresholds: this.parseThresholds(row.channel_id, row.thresholds),
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }

  private parseThresholds(channelId: string, raw: unknown): ThresholdOverrides {
    const overrides: Partial<Record<NetworkKey, INetworkThreshold>> = {};

    if (typeof raw !== 'object' || raw === null) {
      return overrides;
    }

    for (const networkKey of ALL_NETWORK_KEYS) {
      if (!(networkKey in raw)) {
        continue;
      }

      const parsedThreshold = storedThresholdSchema.safeParse(Reflect.get(raw, networkKey));

      if (parsedThreshold.success) {
        overrides[networkKey] = parsedThreshold.data;
      } else {
        this.logger.warn(
          `ignoring stored threshold channelId=${channelId} network=${networkKey} reason=${parsedThreshold.error.message}`,
        );
      }
    }

    return overrides;
  }
}
