/**
 * BaseRepository
 *
 * Local reads and writes for one syncable table:
 * - Every write stamps UpdatedAt, so the next sync picks it up
 * - Deletes are soft and travel like any other change
 * - Observable pattern for UI integration
 */

import { systemClock, type Clock } from '@/lib/clock';
import { generateId, type NewRecord, type SyncableEntity } from '@/lib/types';
import type { Database } from '@/lib/database';
import { SqliteDataSource } from '../datasources/SqliteDataSource';
import type { EntityDefinition } from '../schema';
import type { DataListener } from '../types';

// Sync columns a repository fills in itself
export type SyncFields = Omit<SyncableEntity, 'id'>;

// What callers supply when creating a row
export type EntityInput<T extends SyncableEntity> = Omit<T, keyof SyncableEntity>;

export abstract class BaseRepository<T extends SyncableEntity> {
  protected readonly table: SqliteDataSource<T>;
  protected listeners: Set<DataListener<T>> = new Set();

  constructor(
    db: Database,
    definition: EntityDefinition<T>,
    protected readonly clock: Clock = systemClock
  ) {
    this.table = new SqliteDataSource(db, definition);
  }

  /**
   * Combine caller input with the sync columns.
   */
  protected abstract compose(input: EntityInput<T>, sync: SyncFields): NewRecord<T>;

  // ============ Observable Pattern ============

  /**
   * Subscribe to data changes.
   * Immediately emits current data, then emits on each change.
   */
  subscribe(listener: DataListener<T>): () => void {
    this.listeners.add(listener);
    this.emitCurrentData(listener).catch(console.error);

    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Re-emit to every listener. Called after writes and after a sync has applied changes.
   */
  async refresh(): Promise<void> {
    if (this.listeners.size === 0) return;

    const data = await this.getAll();
    for (const listener of this.listeners) {
      try {
        listener(data);
      } catch (error) {
        console.error('Error in data listener:', error);
      }
    }
  }

  private async emitCurrentData(listener: DataListener<T>): Promise<void> {
    try {
      listener(await this.getAll());
    } catch (error) {
      console.error('Error emitting current data:', error);
      listener([]);
    }
  }

  // ============ Read Operations ============

  /**
   * Get all items (excluding soft-deleted).
   */
  async getAll(): Promise<T[]> {
    return this.table.getAll(false);
  }

  async getById(id: number): Promise<T | null> {
    const row = await this.table.getById(id);
    return row && row.is_deleted === 0 ? row : null;
  }

  async query(filter: Partial<NewRecord<T>>): Promise<T[]> {
    return this.table.query(filter);
  }

  async count(): Promise<number> {
    return this.table.count();
  }

  // ============ Write Operations ============

  async create(input: EntityInput<T>): Promise<T> {
    const record = this.compose(input, {
      global_id: generateId(),
      updated_at: this.clock.now(),
      is_deleted: 0,
    });

    const id = await this.table.insert(record);
    const created = await this.table.getById(id);
    if (!created) {
      throw new Error(`Failed to read back ${this.table.tableName} row ${id}`);
    }

    await this.refresh();
    return created;
  }

  /**
   * Update an existing item. Returns null when it does not exist or is deleted.
   * The sync columns are never taken from `changes`: GlobalId stays fixed and
   * UpdatedAt is always now.
   */
  async update(id: number, changes: Partial<EntityInput<T>>): Promise<T | null> {
    const existing = await this.getById(id);
    if (!existing) return null;

    const { id: _id, global_id, updated_at: _updatedAt, is_deleted, ...fields } = existing;
    const now = this.clock.now();
    const record = this.compose({ ...fields, ...changes }, { global_id, updated_at: now, is_deleted });

    await this.table.update(id, record, now);
    const updated = await this.table.getById(id);

    await this.refresh();
    return updated;
  }

  async delete(id: number): Promise<boolean> {
    const existing = await this.getById(id);
    if (!existing) return false;

    await this.table.softDelete(id, this.clock.now());
    await this.refresh();
    return true;
  }
}
