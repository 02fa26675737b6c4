import type {
  ISubscriberRecord,
  ISubscriberStore,
} from '../core/ports/subscribers/subscriber-store.interfaces';

export class InMemorySubscriberStore implements ISubscriberStore {
  private readonly records: Map<string, ISubscriberRecord> = new Map<string, ISubscriberRecord>();

  public async loadAll(): Promise<readonly ISubscriberRecord[]> {
    return [...this.records.values()];
  }

  public async save(record: ISubscriberRecord): Promise<void> {
    this.records.set(record.channelId, record);
  }
}
