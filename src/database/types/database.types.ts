import type { ColumnType, Insertable, Selectable } from 'kysely';

type TimestampColumn = ColumnType<Date, Date | string | undefined, never>;
type UpdatableTimestampColumn = ColumnType<
  Date,
  Date | string | undefined,
  Date | string | undefined
>;
// JSONB comes back parsed; it goes in as serialized text.
type JsonColumn = ColumnType<unknown, string, string>;

export interface SubscribersTable {
  channel_id: string;
  enabled: boolean;
  thresholds: JsonColumn;
  created_at: TimestampColumn;
  updated_at: UpdatableTimestampColumn;
}

export interface IDatabase {
  subscribers: SubscribersTable;
}

export type SubscriberRow = Selectable<SubscribersTable>;
export type NewSubscriberRow = Insertable<SubscribersTable>;
