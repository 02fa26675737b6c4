import { Injectable, Logger, type OnModuleInit } from '@nestjs/common';
import { type MigrationResultSet, Migrator } from 'kysely';

import { SubscriberMigrationProvider } from './subscriber-migrations';
import { DatabaseService } from '../kysely/database.service';

@Injectable()
export class MigrationService implements OnModuleInit {
  private readonly logger: Logger = new Logger(MigrationService.name);

  public constructor(private readonly databaseService: DatabaseService) {}

  public async onModuleInit(): Promise<void> {
    if (!this.databaseService.isConfigured()) {
      this.logger.log('DATABASE_URL is not set, skipping migrations');
      return;
    }

    const migrator: Migrator = new Migrator({
      db: this.databaseService.getDb(),
      provider: new SubscriberMigrationProvider(),
    });
    const resultSet: MigrationResultSet = await migrator.migrateToLatest();

    if (resultSet.error !== undefined) {
      const errorMessage: string =
        resultSet.error instanceof Error ? resultSet.error.message : String(resultSet.error);
      throw new Error(`Database migration failed: ${errorMessage}`);
    }

    const applied: number = resultSet.results?.length ?? 0;

    if (applied > 0) {
      this.logger.log(`Applied ${String(applied)} migration(s)`);
    } else {
      this.logger.log('Database schema is up to date');
    }
  }
}
