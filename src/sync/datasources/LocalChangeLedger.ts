/**
 * LocalChangeLedger
 *
 * The device store as seen by the sync pipeline. Writes land immediately, so a flush
 * only persists the database file.
 */

import { systemClock, type Clock } from '@/lib/clock';
import type { Database } from '@/lib/database';
import type { NewRecord } from '@/lib/types';
import type { EntityKind, EntityRowMap } from '../types';
import { createEntityTables, type SqliteDataSource } from './SqliteDataSource';
import type { EntityTables, SyncStore, TrackedRecord } from './types';

export class LocalChangeLedger implements SyncStore {
  private readonly tables: EntityTables;

  constructor(
    private readonly db: Database,
    private readonly clock: Clock = systemClock
  ) {
    this.tables = createEntityTables(db);
  }

  now(): string {
    return this.clock.now();
  }

  table<K extends EntityKind>(kind: K): SqliteDataSource<EntityRowMap[K]> {
    return this.tables[kind];
  }

  async findByGlobalId<K extends EntityKind>(kind: K, globalId: string): Promise<TrackedRecord | null> {
    const row = await this.tables[kind].findByGlobalId(globalId);
    if (!row) return null;
    return { id: row.id, global_id: row.global_id, updated_at: row.updated_at };
  }

  async insert<K extends EntityKind>(kind: K, record: NewRecord<EntityRowMap[K]>): Promise<void> {
    await this.tables[kind].insert(record);
  }

  async overwrite<K extends EntityKind>(
    kind: K,
    tracked: TrackedRecord,
    record: NewRecord<EntityRowMap[K]>
  ): Promise<void> {
    if (tracked.id === null) {
      throw new Error(`Cannot overwrite untracked ${kind} ${tracked.global_id}`);
    }
    await this.tables[kind].upsertByLocalId(tracked.id, record);
  }

  async flush(): Promise<void> {
    await this.db.flush();
  }
}
