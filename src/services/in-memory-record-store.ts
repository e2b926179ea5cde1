import { RawSnapshot, RecordStore } from '../interfaces';

/**
 * Record store over arrays already in memory. Each load returns fresh arrays
 * so callers cannot disturb the held snapshot.
 */
export class InMemoryRecordStore implements RecordStore {
  readonly name = 'memory';

  constructor(private readonly snapshot: RawSnapshot) {}

  async loadSnapshot(): Promise<RawSnapshot> {
    return {
      users: this.snapshot.users.map((user) => ({ ...user })),
      transactions: this.snapshot.transactions.map((tx) => ({ ...tx })),
      appEvents: this.snapshot.appEvents.map((event) => ({ ...event })),
    };
  }
}
