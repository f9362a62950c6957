/**
 * Row <-> wire mapping, one pair of functions per entity.
 *
 * Local foreign keys never leave the store: outbound they become the parent's global
 * id (nil when absent), inbound the caller passes the already-resolved local id.
 */

import type { NewRecord } from '@/lib/types';
import type {
  Budget,
  Category,
  RecurringTransaction,
  SavingsGoal,
  SavingsGoalTransaction,
  Settings,
  Transaction,
} from './types';
import { NIL_GLOBAL_ID } from './types';
import type {
  BudgetWire,
  CategoryWire,
  RecurringTransactionWire,
  SavingsGoalTransactionWire,
  SavingsGoalWire,
  SettingsWire,
  TransactionWire,
} from './wire';

export type GlobalIdLookup = ReadonlyMap<number, string>;

function toFlag(value: boolean): number {
  return value ? 1 : 0;
}

function fromFlag(value: number): boolean {
  return value !== 0;
}

export function globalReference(lookup: GlobalIdLookup, localId: number | null): string {
  if (localId === null) return NIL_GLOBAL_ID;
  return lookup.get(localId) ?? NIL_GLOBAL_ID;
}

// ============ Category ============

export function categoryToWire(row: Category): CategoryWire {
  return {
    globalId: row.global_id,
    name: row.name,
    icon: row.icon,
    color: row.color,
    defaultBudget: row.default_budget,
    type: row.type,
    updatedAt: row.updated_at,
    isDeleted: fromFlag(row.is_deleted),
  };
}

export function categoryFromWire(wire: CategoryWire): NewRecord<Category> {
  return {
    global_id: wire.globalId,
    name: wire.name,
    icon: wire.icon,
    color: wire.color,
    default_budget: wire.defaultBudget,
    type: wire.type,
    updated_at: wire.updatedAt,
    is_deleted: toFlag(wire.isDeleted),
  };
}

// ============ Savings Goal ============

export function savingsGoalToWire(row: SavingsGoal): SavingsGoalWire {
  return {
    globalId: row.global_id,
    name: row.name,
    icon: row.icon,
    color: row.color,
    goalAmount: row.goal_amount,
    currentBalance: row.current_balance,
    monthlyContribution: row.monthly_contribution,
    startDate: row.start_date,
    targetDate: row.target_date,
    status: row.status,
    autoContribute: fromFlag(row.auto_contribute),
    lastAutoContributeDate: row.last_auto_contribute_date,
    updatedAt: row.updated_at,
    isDeleted: fromFlag(row.is_deleted),
  };
}

export function savingsGoalFromWire(wire: SavingsGoalWire): NewRecord<SavingsGoal> {
  return {
    global_id: wire.globalId,
    name: wire.name,
    icon: wire.icon,
    color: wire.color,
    goal_amount: wire.goalAmount,
    current_balance: wire.currentBalance,
    monthly_contribution: wire.monthlyContribution,
    start_date: wire.startDate,
    target_date: wire.targetDate,
    status: wire.status,
    auto_contribute: toFlag(wire.autoContribute),
    last_auto_contribute_date: wire.lastAutoContributeDate,
    updated_at: wire.updatedAt,
    is_deleted: toFlag(wire.isDeleted),
  };
}

// ============ Settings ============

export function settingsToWire(row: Settings): SettingsWire {
  return {
    globalId: row.global_id,
    monthlyIncome: row.monthly_income,
    hasCompletedOnboarding: fromFlag(row.has_completed_onboarding),
    updatedAt: row.updated_at,
    isDeleted: fromFlag(row.is_deleted),
  };
}

export function settingsFromWire(wire: SettingsWire): NewRecord<Settings> {
  return {
    global_id: wire.globalId,
    monthly_income: wire.monthlyIncome,
    has_completed_onboarding: toFlag(wire.hasCompletedOnboarding),
    updated_at: wire.updatedAt,
    is_deleted: toFlag(wire.isDeleted),
  };
}

// ============ Transaction ============

export function transactionToWire(row: Transaction, categories: GlobalIdLookup): TransactionWire {
  return {
    globalId: row.global_id,
    description: row.description,
    amount: row.amount,
    date: row.date,
    categoryGlobalId: globalReference(categories, row.category_id),
    type: row.type,
    updatedAt: row.updated_at,
    isDeleted: fromFlag(row.is_deleted),
  };
}

export function transactionFromWire(wire: TransactionWire, categoryId: number): NewRecord<Transaction> {
  return {
    global_id: wire.globalId,
    description: wire.description,
    amount: wire.amount,
    date: wire.date,
    category_id: categoryId,
    type: wire.type,
    updated_at: wire.updatedAt,
    is_deleted: toFlag(wire.isDeleted),
  };
}

// ============ Budget ============

export function budgetToWire(row: Budget, categories: GlobalIdLookup): BudgetWire {
  return {
    globalId: row.global_id,
    categoryGlobalId: globalReference(categories, row.category_id),
    amount: row.amount,
    month: row.month,
    year: row.year,
    updatedAt: row.updated_at,
    isDeleted: fromFlag(row.is_deleted),
  };
}

export function budgetFromWire(wire: BudgetWire, categoryId: number): NewRecord<Budget> {
  return {
    global_id: wire.globalId,
    category_id: categoryId,
    amount: wire.amount,
    month: wire.month,
    year: wire.year,
    updated_at: wire.updatedAt,
    is_deleted: toFlag(wire.isDeleted),
  };
}

// ============ Recurring Transaction ============

export function recurringTransactionToWire(
  row: RecurringTransaction,
  categories: GlobalIdLookup
): RecurringTransactionWire {
  return {
    globalId: row.global_id,
    description: row.description,
    amount: row.amount,
    categoryGlobalId: globalReference(categories, row.category_id),
    type: row.type,
    frequency: row.frequency,
    dayOfMonth: row.day_of_month,
    startDate: row.start_date,
    nextDueDate: row.next_due_date,
    isActive: fromFlag(row.is_active),
    updatedAt: row.updated_at,
    isDeleted: fromFlag(row.is_deleted),
  };
}

export function recurringTransactionFromWire(
  wire: RecurringTransactionWire,
  categoryId: number
): NewRecord<RecurringTransaction> {
  return {
    global_id: wire.globalId,
    description: wire.description,
    amount: wire.amount,
    category_id: categoryId,
    type: wire.type,
    frequency: wire.frequency,
    day_of_month: wire.dayOfMonth,
    start_date: wire.startDate,
    next_due_date: wire.nextDueDate,
    is_active: toFlag(wire.isActive),
    updated_at: wire.updatedAt,
    is_deleted: toFlag(wire.isDeleted),
  };
}

// ============ Savings Goal Transaction ============

export function savingsGoalTransactionToWire(
  row: SavingsGoalTransaction,
  savingsGoals: GlobalIdLookup
): SavingsGoalTransactionWire {
  return {
    globalId: row.global_id,
    savingsGoalGlobalId: globalReference(savingsGoals, row.savings_goal_id),
    date: row.date,
    amount: row.amount,
    type: row.type,
    note: row.note,
    updatedAt: row.updated_at,
    isDeleted: fromFlag(row.is_deleted),
  };
}

export function savingsGoalTransactionFromWire(
  wire: SavingsGoalTransactionWire,
  savingsGoalId: number
): NewRecord<SavingsGoalTransaction> {
  return {
    global_id: wire.globalId,
    savings_goal_id: savingsGoalId,
    date: wire.date,
    amount: wire.amount,
    type: wire.type,
    note: wire.note,
    updated_at: wire.updatedAt,
    is_deleted: toFlag(wire.isDeleted),
  };
}
