import { Module } from '@nestjs/common';

import { InMemorySubscriberStore } from './in-memory-subscriber.store';
import { SubscriberRegistryService } from './subscriber-registry.service';
import { SUBSCRIBER_STORE } from '../core/ports/subscribers/subscriber-store-port.tokens';
import type { ISubscriberStore } from '../core/ports/subscribers/subscriber-store.interfaces';
import { DatabaseModule } from '../database/database.module';
import { DatabaseService } from '../database/kysely/database.service';
import { SubscribersRepository } from '../database/repositories/subscribers.repository';
import { ObservabilityModule } from '../observability/observability.module';

const createSubscriberStore = (
  databaseService: DatabaseService,
  subscribersRepository: SubscribersRepository,
): ISubscriberStore =>
  databaseService.isConfigured() ? subscribersRepository : new InMemorySubscriberStore();

@Module({
  imports: [DatabaseModule, ObservabilityModule],
  providers: [
    {
      provide: SUBSCRIBER_STORE,
      inject: [DatabaseService, SubscribersRepository],
      useFactory: createSubscriberStore,
    },
    SubscriberRegistryService,
  ],
  exports: [SubscriberRegistryService],
})
export class SubscribersModule {}
