/**
 * Sync Module Public API
 *
 * Offline-first synchronization between a device's SQLite store and the shared store
 * behind POST /api/sync.
 *
 * Architecture:
 * - The local database is the source of truth for all reads and writes
 * - One round trip per sync: local changes since the watermark go up, server changes come back
 * - Last-write-wins on UpdatedAt, soft deletes, duplicate merging on both ends
 */

// Types
export type {
  ApplyStats,
  DataListener,
  EntityKind,
  EntityRowMap,
  NormalizeStats,
  ParentKind,
  SyncOutcome,
  SyncResult,
  SyncStatusListener,
  SyncStatusState,
} from './types';

export { NIL_GLOBAL_ID, PHASE_ONE_KINDS, PHASE_TWO_KINDS, SYNC_CONFIG, SYNC_KIND_ORDER } from './types';

export {
  ENTITY_DEFINITIONS,
  FALLBACK_CATEGORY_NAME,
  FALLBACK_SAVINGS_GOAL_NAME,
  childKindsOf,
  type EntityDefinition,
} from './schema';

// Wire format
export {
  syncPayloadSchema,
  syncRequestSchema,
  syncResponseSchema,
  type SyncPayload,
  type SyncRequest,
  type SyncResponse,
} from './wire';

// Services
export { ChangeApplier, type ChangeApplierOptions } from './services/ChangeApplier';
export { ChangeCollector } from './services/ChangeCollector';
export { DuplicateNormalizer } from './services/DuplicateNormalizer';
export { SyncService, type SyncServiceOptions } from './services/SyncService';
export { compareBySurvival, isNewer, laterOf } from './services/conflict';

// Data Sources
export { HttpSyncTransport, SyncTransportError, type FetchLike } from './datasources/HttpSyncTransport';
export { LocalChangeLedger } from './datasources/LocalChangeLedger';
export { SqliteDataSource, createEntityTables, type OwnerScope } from './datasources/SqliteDataSource';
export type {
  CredentialProvider,
  SyncStore,
  SyncTransport,
  TrackedRecord,
  WatermarkStore,
} from './datasources/types';

// Repositories
export * from './repositories';

export { createDeviceSync, type DeviceSync, type DeviceSyncOptions } from './device';
