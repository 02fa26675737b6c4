import { Injectable, Logger, type OnModuleDestroy } from '@nestjs/common';
import { Kysely, PostgresDialect, sql } from 'kysely';
import { Pool } from 'pg';

import { AppConfigService } from '../../config/app-config.service';
import type { IDatabase } from '../types/database.types';

/**
 * Owns the Kysely instance when DATABASE_URL is set. Without it the service stays idle
 * and subscribers live in memory.
 */
@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly logger: Logger = new Logger(DatabaseService.name);
  private readonly db: Kysely<IDatabase> | null;

  public constructor(appConfigService: AppConfigService) {
    const databaseUrl: string | null = appConfigService.databaseUrl;

    if (databaseUrl === null) {
      this.db = null;
      return;
    }

    const pool: Pool = new Pool({
      connectionString: databaseUrl,
    });

    pool.on('error', (error: Error): void => {
      this.logger.error(`pg pool error: ${error.message}`);
    });

    this.db = new Kysely<IDatabase>({
      dialect: new PostgresDialect({ pool }),
    });
  }

  public isConfigured(): boolean {
    return this.db !== null;
  }

  public getDb(): Kysely<IDatabase> {
    if (this.db === null) {
      throw new Error('DATABASE_URL is not set, database access is unavailable.');
    }

    return this.db;
  }

  public async healthCheck(): Promise<boolean> {
    if (this.db === null) {
      return false;
    }

    try {
      await sql`select 1`.execute(this.db);
      return true;
    } catch {
      return false;
    }
  }

  public async onModuleDestroy(): Promise<void> {
    if (this.db !== null) {
      await this.db.destroy();
    }
  }
}
