/**
 * DuplicateNormalizer
 *
 * Collapses rows that should be one logical record. Runs per entity kind in
 * dependency order, so parents are settled before their children are grouped:
 * 1. Exact pass: rows sharing a global id. The highest local id survives, children
 *    are repointed and the others are physically removed.
 * 2. Semantic pass: active rows sharing a natural key. The most recently updated row
 *    survives, children are repointed and the others are soft-deleted so the
 *    collapse replicates.
 */

import { childKindsOf } from '../schema';
import type { SyncStore } from '../datasources/types';
import type { SqliteDataSource } from '../datasources/SqliteDataSource';
import { SYNC_KIND_ORDER, type EntityKind, type NormalizeStats, type SyncableEntity } from '../types';
import { compareBySurvival } from './conflict';

function groupBy<T>(rows: T[], keyOf: (row: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const row of rows) {
    const key = keyOf(row);
    const group = groups.get(key);
    if (group) {
      group.push(row);
    } else {
      groups.set(key, [row]);
    }
  }
  return groups;
}

export class DuplicateNormalizer {
  constructor(
    private readonly store: SyncStore,
    private readonly logPrefix: string = '[Normalizer]'
  ) {}

  async normalize(): Promise<NormalizeStats> {
    const now = this.store.now();
    const stats: NormalizeStats = { exactRemoved: 0, semanticRemoved: 0 };

    for (const kind of SYNC_KIND_ORDER) {
      await this.normalizeKind(kind, now, stats);
    }

    return stats;
  }

  private async normalizeKind<K extends EntityKind>(kind: K, now: string, stats: NormalizeStats): Promise<void> {
    const table = this.store.table(kind);
    stats.exactRemoved += await this.collapseExactDuplicates(kind, table, now);
    stats.semanticRemoved += await this.collapseSemanticDuplicates(kind, table, now);
  }

  private async collapseExactDuplicates<T extends SyncableEntity>(
    kind: EntityKind,
    table: SqliteDataSource<T>,
    now: string
  ): Promise<number> {
    const rows = await table.getAll(true);
    let removed = 0;

    for (const [globalId, group] of groupBy(rows, row => row.global_id)) {
      if (group.length < 2) continue;

      const keeper = group.reduce((best, row) => (row.id > best.id ? row : best));
      for (const row of group) {
        if (row.id === keeper.id) continue;
        await this.repointChildren(kind, row.id, keeper.id, now);
        await table.hardDelete(row.id);
        removed++;
      }

      console.warn(`${this.logPrefix} Removed ${group.length - 1} exact duplicate(s) of ${kind} ${globalId}`);
    }

    return removed;
  }

  private async collapseSemanticDuplicates<T extends SyncableEntity>(
    kind: EntityKind,
    table: SqliteDataSource<T>,
    now: string
  ): Promise<number> {
    const naturalKey = table.definition.naturalKey;
    if (!naturalKey) return 0;

    const rows = await table.getAll(false);
    let removed = 0;

    for (const group of groupBy(rows, naturalKey).values()) {
      if (group.length < 2) continue;

      const [keeper, ...duplicates] = [...group].sort(compareBySurvival);
      for (const row of duplicates) {
        await this.repointChildren(kind, row.id, keeper.id, now);
        await table.softDelete(row.id, now);
        removed++;
      }

      console.info(
        `${this.logPrefix} Merged ${duplicates.length} duplicate ${kind}(s) into ${keeper.global_id}`
      );
    }

    return removed;
  }

  private async repointChildren(kind: EntityKind, fromId: number, toId: number, now: string): Promise<void> {
    for (const childKind of childKindsOf(kind)) {
      await this.store.table(childKind).repoint(fromId, toId, now);
    }
  }
}
