import type { Clock } from '@/lib/clock';
import type { Database } from '@/lib/database';
import type { Budget, NewRecord } from '@/lib/types';
import { ENTITY_DEFINITIONS } from '../schema';
import { BaseRepository, type EntityInput, type SyncFields } from './BaseRepository';

export class BudgetsRepository extends BaseRepository<Budget> {
  constructor(db: Database, clock?: Clock) {
    super(db, ENTITY_DEFINITIONS.budget, clock);
  }

  protected compose(input: EntityInput<Budget>, sync: SyncFields): NewRecord<Budget> {
    return { ...input, ...sync };
  }

  async getForMonth(year: number, month: number): Promise<Budget[]> {
    return this.query({ year, month });
  }

  /**
   * Set the amount for a category and month, creating the budget when there is none.
   */
  async upsertForCategoryMonth(categoryId: number, year: number, month: number, amount: number): Promise<Budget> {
    const [existing] = await this.query({ category_id: categoryId, year, month });
    if (existing) {
      const updated = await this.update(existing.id, { amount });
      if (updated) return updated;
    }
    return this.create({ category_id: categoryId, year, month, amount });
  }
}
