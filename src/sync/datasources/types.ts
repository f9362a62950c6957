/**
 * DataSource Types
 *
 * Interfaces for the stores and services the sync pipeline runs against.
 * The device ledger and the server's per-request scope both implement SyncStore,
 * so the normalizer, collector and applier are shared by both ends.
 */

import type { NewRecord } from '@/lib/types';
import type { SyncRequest, SyncResponse } from '../wire';
import type { EntityKind, EntityRowMap } from '../types';
import type { SqliteDataSource } from './SqliteDataSource';

export type EntityTables = { [K in EntityKind]: SqliteDataSource<EntityRowMap[K]> };

/**
 * Identity of a row that the applier matched by global id. `id` is null while the
 * row is still a pending insert of the current request.
 */
export interface TrackedRecord {
  id: number | null;
  global_id: string;
  updated_at: string;
}

export interface SyncStore {
  /**
   * Timestamp for mutations made by sync itself (repoints, soft deletes, fallbacks).
   */
  now(): string;

  table<K extends EntityKind>(kind: K): SqliteDataSource<EntityRowMap[K]>;

  /**
   * Find a row by global id, deleted rows and not-yet-flushed inserts included.
   */
  findByGlobalId<K extends EntityKind>(kind: K, globalId: string): Promise<TrackedRecord | null>;

  insert<K extends EntityKind>(kind: K, record: NewRecord<EntityRowMap[K]>): Promise<void>;

  /**
   * Replace every field of a tracked row, keeping its local id.
   */
  overwrite<K extends EntityKind>(kind: K, tracked: TrackedRecord, record: NewRecord<EntityRowMap[K]>): Promise<void>;

  /**
   * Make every insert so far durable and visible to lookups.
   */
  flush(): Promise<void>;
}

/**
 * One authenticated round trip to the sync endpoint.
 */
export interface SyncTransport {
  sync(request: SyncRequest, credential: string): Promise<SyncResponse>;
}

export interface CredentialProvider {
  /**
   * A usable bearer token, refreshed if close to expiry, or null when signed out.
   */
  getValidCredential(): Promise<string | null>;
}

export interface WatermarkStore {
  load(): Promise<string | null>;
  save(watermark: string): Promise<void>;
}
