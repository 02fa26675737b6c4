import { Module } from '@nestjs/common';

import { DatabaseService } from './kysely/database.service';
import { MigrationService } from './migrations/migration.service';
import { SubscribersRepository } from './repositories/subscribers.repository';

@Module({
  providers: [MigrationService, DatabaseService, SubscribersRepository],
  exports: [DatabaseService, SubscribersRepository],
})
export class DatabaseModule {}
