/**
 * ChangeApplier
 *
 * Applies a change set to a store in two phases. Independent rows (categories,
 * savings goals, settings) are written and flushed before any dependent row is
 * looked at, so global references resolve against parents from the same payload.
 * References that still do not resolve point at the owner's fallback parent.
 */

import { generateId, type NewRecord } from '@/lib/types';
import type { SyncStore } from '../datasources/types';
import {
  budgetFromWire,
  categoryFromWire,
  recurringTransactionFromWire,
  savingsGoalFromWire,
  savingsGoalTransactionFromWire,
  settingsFromWire,
  transactionFromWire,
} from '../mappers';
import {
  addApplyStats,
  emptyApplyStats,
  NIL_GLOBAL_ID,
  type ApplyStats,
  type EntityKind,
  type EntityRowMap,
  type ParentKind,
} from '../types';
import type { SyncPayload } from '../wire';
import { isNewer, strictlyAfter } from './conflict';

export interface ChangeApplierOptions {
  /**
   * Give rows whose reference was replaced by a fallback parent a new UpdatedAt, so
   * the sender takes the corrected row back instead of discarding it as an echo.
   */
  restampFallbacks?: boolean;
}

interface ResolvedParent {
  id: number;
  fallback: boolean;
}

interface WireIdentity {
  globalId: string;
  updatedAt: string;
}

export class ChangeApplier {
  private readonly fallbackIds = new Map<ParentKind, number>();

  constructor(
    private readonly store: SyncStore,
    private readonly logPrefix: string = '[SyncService]',
    private readonly options: ChangeApplierOptions = {}
  ) {}

  /**
   * Apply both phases in order.
   */
  async apply(payload: SyncPayload): Promise<ApplyStats> {
    const independent = await this.applyIndependent(payload);
    const dependent = await this.applyDependent(payload);
    return addApplyStats(independent, dependent);
  }

  /**
   * Phase 1: rows without references to other syncable rows.
   */
  async applyIndependent(payload: SyncPayload): Promise<ApplyStats> {
    const stats = emptyApplyStats();

    for (const wire of payload.categories) {
      await this.applyRecord('category', wire, async () => categoryFromWire(wire), stats);
    }
    for (const wire of payload.savingsGoals) {
      await this.applyRecord('savingsGoal', wire, async () => savingsGoalFromWire(wire), stats);
    }
    for (const wire of payload.settings) {
      await this.applyRecord('settings', wire, async () => settingsFromWire(wire), stats);
    }

    await this.store.flush();
    return stats;
  }

  /**
   * Phase 2: rows that reference Phase 1 rows. Lookups are read only now, after the
   * Phase 1 flush.
   */
  async applyDependent(payload: SyncPayload): Promise<ApplyStats> {
    const stats = emptyApplyStats();
    const categoryIds = await this.store.table('category').localIdsByGlobalId();
    const savingsGoalIds = await this.store.table('savingsGoal').localIdsByGlobalId();

    for (const wire of payload.transactions) {
      await this.applyRecord('transaction', wire, async () => {
        const category = await this.resolveParent('category', categoryIds, wire.categoryGlobalId, stats);
        return this.restamp(transactionFromWire(wire, category.id), category);
      }, stats);
    }
    for (const wire of payload.budgets) {
      await this.applyRecord('budget', wire, async () => {
        const category = await this.resolveParent('category', categoryIds, wire.categoryGlobalId, stats);
        return this.restamp(budgetFromWire(wire, category.id), category);
      }, stats);
    }
    for (const wire of payload.recurringTransactions) {
      await this.applyRecord('recurringTransaction', wire, async () => {
        const category = await this.resolveParent('category', categoryIds, wire.categoryGlobalId, stats);
        return this.restamp(recurringTransactionFromWire(wire, category.id), category);
      }, stats);
    }
    for (const wire of payload.savingsGoalTransactions) {
      await this.applyRecord('savingsGoalTransaction', wire, async () => {
        const goal = await this.resolveParent('savingsGoal', savingsGoalIds, wire.savingsGoalGlobalId, stats);
        return this.restamp(savingsGoalTransactionFromWire(wire, goal.id), goal);
      }, stats);
    }

    await this.store.flush();
    return stats;
  }

  // ============ Private Methods ============

  /**
   * Insert when unknown, overwrite when strictly newer, otherwise discard.
   * The record is only built once it is going to be written.
   */
  private async applyRecord<K extends EntityKind>(
    kind: K,
    identity: WireIdentity,
    build: () => Promise<NewRecord<EntityRowMap[K]>>,
    stats: ApplyStats
  ): Promise<void> {
    const tracked = await this.store.findByGlobalId(kind, identity.globalId);

    if (tracked && !isNewer(identity.updatedAt, tracked.updated_at)) {
      stats.skipped++;
      return;
    }

    const record = await build();
    if (tracked) {
      await this.store.overwrite(kind, tracked, record);
      stats.updated++;
    } else {
      await this.store.insert(kind, record);
      stats.inserted++;
    }
  }

  private async resolveParent(
    kind: ParentKind,
    localIds: ReadonlyMap<string, number>,
    globalId: string,
    stats: ApplyStats
  ): Promise<ResolvedParent> {
    if (globalId !== NIL_GLOBAL_ID) {
      const localId = localIds.get(globalId);
      if (localId !== undefined) return { id: localId, fallback: false };
    }

    stats.fallbacks++;
    return { id: await this.fallbackId(kind), fallback: true };
  }

  private restamp<R extends { updated_at: string }>(record: R, parent: ResolvedParent): R {
    if (!parent.fallback || !this.options.restampFallbacks) return record;
    return { ...record, updated_at: strictlyAfter(record.updated_at, this.store.now()) };
  }

  private async fallbackId(kind: ParentKind): Promise<number> {
    const cached = this.fallbackIds.get(kind);
    if (cached !== undefined) return cached;

    const { id, created } = await this.store.table(kind).getOrCreateFallback(generateId(), this.store.now());
    if (created) {
      console.info(`${this.logPrefix} Created fallback ${kind} (id ${id})`);
    }
    this.fallbackIds.set(kind, id);
    return id;
  }
}
