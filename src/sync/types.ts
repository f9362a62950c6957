/**
 * Sync Types
 *
 * Shared type definitions for the offline-first synchronization system.
 */

import type {
  Budget,
  Category,
  RecurringTransaction,
  SavingsGoal,
  SavingsGoalTransaction,
  Settings,
  Transaction,
} from '@/lib/types';

// Re-export entity types from lib/types for convenience
export type {
  Budget,
  Category,
  NewRecord,
  RecurringTransaction,
  SavingsGoal,
  SavingsGoalTransaction,
  Settings,
  SyncableEntity,
  Transaction,
} from '@/lib/types';

// Row type per syncable entity
export interface EntityRowMap {
  category: Category;
  savingsGoal: SavingsGoal;
  settings: Settings;
  transaction: Transaction;
  budget: Budget;
  recurringTransaction: RecurringTransaction;
  savingsGoalTransaction: SavingsGoalTransaction;
}

export type EntityKind = keyof EntityRowMap;

// Parents that dependent rows point at
export type ParentKind = 'category' | 'savingsGoal';

// Phase 1: no foreign keys to other syncable entities
export const PHASE_ONE_KINDS = ['category', 'savingsGoal', 'settings'] as const satisfies readonly EntityKind[];

// Phase 2: reference Phase 1 rows
export const PHASE_TWO_KINDS = [
  'transaction',
  'budget',
  'recurringTransaction',
  'savingsGoalTransaction',
] as const satisfies readonly EntityKind[];

// FK dependency order for sync operations
export const SYNC_KIND_ORDER: readonly EntityKind[] = [...PHASE_ONE_KINDS, ...PHASE_TWO_KINDS];

// The absent global reference
export const NIL_GLOBAL_ID = '00000000-0000-0000-0000-000000000000';

// Sync configuration
export const SYNC_CONFIG = {
  PERIODIC_SYNC_MS: 60000,                 // Full sync every 60 seconds
  TOKEN_REFRESH_MARGIN_MS: 5 * 60 * 1000,  // Refresh tokens expiring within 5 minutes
  SYNC_PATH: '/api/sync',
} as const;

export type SyncOutcome = 'completed' | 'busy' | 'unauthenticated' | 'failed';

// Sync result for overall sync operation
export interface SyncResult {
  outcome: SyncOutcome;
  pushed: number;
  pulled: number;
  errors: string[];
}

// Per-call counters from the change applier
export interface ApplyStats {
  inserted: number;
  updated: number;
  skipped: number;
  fallbacks: number;
}

export function emptyApplyStats(): ApplyStats {
  return { inserted: 0, updated: 0, skipped: 0, fallbacks: 0 };
}

export function addApplyStats(a: ApplyStats, b: ApplyStats): ApplyStats {
  return {
    inserted: a.inserted + b.inserted,
    updated: a.updated + b.updated,
    skipped: a.skipped + b.skipped,
    fallbacks: a.fallbacks + b.fallbacks,
  };
}

export interface NormalizeStats {
  exactRemoved: number;
  semanticRemoved: number;
}

// Sync status for observers
export type SyncStatusState = 'disabled' | 'idle' | 'running';

// Listener types for observable pattern
export type DataListener<T> = (data: T[]) => void;
export type SyncStatusListener = (status: SyncStatusState, error?: string) => void;
