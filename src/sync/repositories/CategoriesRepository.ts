import type { Category, CategoryType, NewRecord } from '@/lib/types';
import type { Clock } from '@/lib/clock';
import type { Database } from '@/lib/database';
import { ENTITY_DEFINITIONS } from '../schema';
import { BaseRepository, type EntityInput, type SyncFields } from './BaseRepository';

export type CategoryInput = EntityInput<Category>;

// Seeded on every fresh install, which is where most cross-device duplicates come from
export const DEFAULT_CATEGORIES: readonly CategoryInput[] = [
  { name: 'Rent/Mortgage', icon: '🏠', color: '#EF4444', default_budget: 1500, type: 'fixed' },
  { name: 'Bills & Utilities', icon: '📄', color: '#F97316', default_budget: 300, type: 'fixed' },
  { name: 'Insurance', icon: '🛡️', color: '#3B82F6', default_budget: 200, type: 'fixed' },
  { name: 'Subscriptions', icon: '📱', color: '#8B5CF6', default_budget: 50, type: 'fixed' },
  { name: 'Transport', icon: '🚗', color: '#06B6D4', default_budget: 200, type: 'fixed' },
  { name: 'Food & Dining', icon: '🍽️', color: '#F59E0B', default_budget: 500, type: 'discretionary' },
  { name: 'Shopping', icon: '🛍️', color: '#EC4899', default_budget: 300, type: 'discretionary' },
  { name: 'Entertainment', icon: '🎬', color: '#A855F7', default_budget: 150, type: 'discretionary' },
  { name: 'Health & Fitness', icon: '💪', color: '#10B981', default_budget: 100, type: 'discretionary' },
  { name: 'Personal Care', icon: '💊', color: '#14B8A6', default_budget: 75, type: 'discretionary' },
];

export class CategoriesRepository extends BaseRepository<Category> {
  constructor(db: Database, clock?: Clock) {
    super(db, ENTITY_DEFINITIONS.category, clock);
  }

  protected compose(input: CategoryInput, sync: SyncFields): NewRecord<Category> {
    return { ...input, ...sync };
  }

  /**
   * Seed the default categories into an empty table. Returns how many were created.
   */
  async ensureDefaults(): Promise<number> {
    if ((await this.count()) > 0) return 0;

    for (const category of DEFAULT_CATEGORIES) {
      await this.create(category);
    }
    return DEFAULT_CATEGORIES.length;
  }

  /**
   * Case- and whitespace-insensitive lookup among active categories.
   */
  async getByName(name: string): Promise<Category | null> {
    const results = await this.table.select('LOWER(TRIM(name)) = $1', [name.trim().toLowerCase()]);
    return results[0] ?? null;
  }

  async getByType(type: CategoryType): Promise<Category[]> {
    return this.table.select('type = $1', [type], 'name ASC');
  }
}
