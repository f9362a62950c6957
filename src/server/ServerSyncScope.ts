/**
 * ServerSyncScope
 *
 * The shared store as seen by one sync request for one owner. Inserts are held back
 * until the phase flush, and lookups by global id consult those pending inserts too,
 * so a global id repeated within a request is inserted once.
 */

import type { Clock } from '@/lib/clock';
import type { Database } from '@/lib/database';
import type { NewRecord } from '@/lib/types';
import { createEntityTables, type SqliteDataSource } from '@/sync/datasources/SqliteDataSource';
import type { EntityTables, SyncStore, TrackedRecord } from '@/sync/datasources/types';
import type { EntityKind, EntityRowMap } from '@/sync/types';

interface PendingInsert {
  globalId: string;
  updatedAt: string;
  write: () => Promise<number>;
}

export class ServerSyncScope implements SyncStore {
  private readonly tables: EntityTables;
  private readonly pending = new Map<string, PendingInsert>();

  constructor(
    private readonly db: Database,
    readonly ownerId: string,
    changeStamp: string,
    private readonly clock: Clock
  ) {
    this.tables = createEntityTables(db, { ownerId, changeStamp });
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  now(): string {
    return this.clock.now();
  }

  table<K extends EntityKind>(kind: K): SqliteDataSource<EntityRowMap[K]> {
    return this.tables[kind];
  }

  async findByGlobalId<K extends EntityKind>(kind: K, globalId: string): Promise<TrackedRecord | null> {
    const row = await this.tables[kind].findByGlobalId(globalId);
    if (row) {
      return { id: row.id, global_id: row.global_id, updated_at: row.updated_at };
    }

    const pending = this.pending.get(pendingKey(kind, globalId));
    if (pending) {
      return { id: null, global_id: pending.globalId, updated_at: pending.updatedAt };
    }

    return null;
  }

  async insert<K extends EntityKind>(kind: K, record: NewRecord<EntityRowMap[K]>): Promise<void> {
    const table = this.tables[kind];
    this.pending.set(pendingKey(kind, record.global_id), {
      globalId: record.global_id,
      updatedAt: record.updated_at,
      write: () => table.insert(record),
    });
  }

  async overwrite<K extends EntityKind>(
    kind: K,
    tracked: TrackedRecord,
    record: NewRecord<EntityRowMap[K]>
  ): Promise<void> {
    if (tracked.id === null) {
      // Still pending: replace the queued insert
      await this.insert(kind, record);
      return;
    }
    await this.tables[kind].upsertByLocalId(tracked.id, record);
  }

  async flush(): Promise<void> {
    const inserts = [...this.pending.values()];
    this.pending.clear();

    for (const insert of inserts) {
      await insert.write();
    }
    await this.db.flush();
  }
}

function pendingKey(kind: EntityKind, globalId: string): string {
  return `${kind}:${globalId}`;
}
