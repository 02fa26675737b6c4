import { type Kysely, type Migration, type MigrationProvider, sql } from 'kysely';

const migrations: Readonly<Record<string, Migration>> = {
  '0001_create_subscribers': {
    up: async (db: Kysely<unknown>): Promise<void> => {
      await db.schema
        .createTable('subscribers')
        .ifNotExists()
        .addColumn('channel_id', 'text', (column) => column.primaryKey())
        .addColumn('enabled', 'boolean', (column) => column.notNull().defaultTo(true))
        .addColumn('thresholds', 'jsonb', (column) =>
          column.notNull().defaultTo(sql`'{}'::jsonb`),
        )
        .addColumn('created_at', 'timestamptz', (column) =>
          column.notNull().defaultTo(sql`now()`),
        )
        .addColumn('updated_at', 'timestamptz', (column) =>
          column.notNull().defaultTo(sql`now()`),
        )
        .execute();
    },
    down: async (db: Kysely<unknown>): Promise<void> => {
      await db.schema.dropTable('subscribers').ifExists().execute();
    },
  },
};

export class SubscriberMigrationProvider implements MigrationProvider {
  public async getMigrations(): Promise<Record<string, Migration>> {
    return { ...migrations };
  }
}
