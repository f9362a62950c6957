/**
 * Entity definitions
 *
 * Table layout, foreign key and duplicate-detection key for every syncable entity.
 * Device and server stores are built from the same definitions.
 */

import type { NewRecord, SyncableEntity } from '@/lib/types';
import type { Category, EntityKind, EntityRowMap, ParentKind, SavingsGoal } from './types';

export type EntityColumn<T extends SyncableEntity> = Exclude<keyof T, 'id'> & string;

export interface ParentReference {
  kind: ParentKind;
  column: 'category_id' | 'savings_goal_id';
}

export interface FallbackDefinition<T extends SyncableEntity> {
  name: string;
  create(globalId: string, now: string): NewRecord<T>;
}

export interface EntityDefinition<T extends SyncableEntity> {
  kind: EntityKind;
  tableName: string;
  columns: readonly EntityColumn<T>[];
  parent?: ParentReference;
  // Rows with equal keys are the same logical record
  naturalKey?: (row: T) => string;
  fallback?: FallbackDefinition<T>;
}

export type EntityDefinitions = { [K in EntityKind]: EntityDefinition<EntityRowMap[K]> };

const SYNC_COLUMNS = ['global_id', 'updated_at', 'is_deleted'] as const;

const FALLBACK_COLOR = '#6B7280';

export const FALLBACK_CATEGORY_NAME = 'Uncategorized';
export const FALLBACK_SAVINGS_GOAL_NAME = 'Unassigned Savings Goal';

function normalizeName(name: string): string {
  return name.trim().toLowerCase();
}

const categoryDefinition: EntityDefinition<Category> = {
  kind: 'category',
  tableName: 'categories',
  columns: [...SYNC_COLUMNS, 'name', 'icon', 'color', 'default_budget', 'type'],
  naturalKey: row => `${normalizeName(row.name)}|${row.type}`,
  fallback: {
    name: FALLBACK_CATEGORY_NAME,
    create: (globalId, now) => ({
      global_id: globalId,
      name: FALLBACK_CATEGORY_NAME,
      icon: '❓',
      color: FALLBACK_COLOR,
      default_budget: 0,
      type: 'discretionary',
      updated_at: now,
      is_deleted: 0,
    }),
  },
};

const savingsGoalDefinition: EntityDefinition<SavingsGoal> = {
  kind: 'savingsGoal',
  tableName: 'savings_goals',
  columns: [
    ...SYNC_COLUMNS,
    'name',
    'icon',
    'color',
    'goal_amount',
    'current_balance',
    'monthly_contribution',
    'start_date',
    'target_date',
    'status',
    'auto_contribute',
    'last_auto_contribute_date',
  ],
  naturalKey: row => normalizeName(row.name),
  fallback: {
    name: FALLBACK_SAVINGS_GOAL_NAME,
    create: (globalId, now) => ({
      global_id: globalId,
      name: FALLBACK_SAVINGS_GOAL_NAME,
      icon: '🏦',
      color: FALLBACK_COLOR,
      goal_amount: 0,
      current_balance: 0,
      monthly_contribution: 0,
      start_date: now.split('T')[0],
      target_date: null,
      status: 'active',
      auto_contribute: 0,
      last_auto_contribute_date: null,
      updated_at: now,
      is_deleted: 0,
    }),
  },
};

export const ENTITY_DEFINITIONS: EntityDefinitions = {
  category: categoryDefinition,
  savingsGoal: savingsGoalDefinition,
  settings: {
    kind: 'settings',
    tableName: 'settings',
    columns: [...SYNC_COLUMNS, 'monthly_income', 'has_completed_onboarding'],
    // One active settings row per owner
    naturalKey: () => 'settings',
  },
  transaction: {
    kind: 'transaction',
    tableName: 'transactions',
    columns: [...SYNC_COLUMNS, 'description', 'amount', 'date', 'category_id', 'type'],
    parent: { kind: 'category', column: 'category_id' },
  },
  budget: {
    kind: 'budget',
    tableName: 'budgets',
    columns: [...SYNC_COLUMNS, 'category_id', 'amount', 'month', 'year'],
    parent: { kind: 'category', column: 'category_id' },
    naturalKey: row => `${row.category_id ?? ''}|${row.year}|${row.month}`,
  },
  recurringTransaction: {
    kind: 'recurringTransaction',
    tableName: 'recurring_transactions',
    columns: [
      ...SYNC_COLUMNS,
      'description',
      'amount',
      'category_id',
      'type',
      'frequency',
      'day_of_month',
      'start_date',
      'next_due_date',
      'is_active',
    ],
    parent: { kind: 'category', column: 'category_id' },
  },
  savingsGoalTransaction: {
    kind: 'savingsGoalTransaction',
    tableName: 'savings_goal_transactions',
    columns: [...SYNC_COLUMNS, 'savings_goal_id', 'date', 'amount', 'type', 'note'],
    parent: { kind: 'savingsGoal', column: 'savings_goal_id' },
  },
};

/**
 * Kinds whose rows reference the given parent kind.
 */
export function childKindsOf(kind: EntityKind): EntityKind[] {
  const children: EntityKind[] = [];
  for (const definition of Object.values(ENTITY_DEFINITIONS)) {
    if (definition.parent?.kind === kind) {
      children.push(definition.kind);
    }
  }
  return children;
}
