/**
 * Repository exports and a factory wiring all of them to one database.
 */

import type { Clock } from '@/lib/clock';
import type { Database } from '@/lib/database';
import { BudgetsRepository } from './BudgetsRepository';
import { CategoriesRepository } from './CategoriesRepository';
import { RecurringTransactionsRepository } from './RecurringTransactionsRepository';
import { SavingsGoalTransactionsRepository } from './SavingsGoalTransactionsRepository';
import { SavingsGoalsRepository } from './SavingsGoalsRepository';
import { SettingsRepository } from './SettingsRepository';
import { TransactionsRepository } from './TransactionsRepository';

export { BaseRepository, type EntityInput, type SyncFields } from './BaseRepository';
export { BudgetsRepository } from './BudgetsRepository';
export { CategoriesRepository, DEFAULT_CATEGORIES, type CategoryInput } from './CategoriesRepository';
export { RecurringTransactionsRepository } from './RecurringTransactionsRepository';
export { SavingsGoalTransactionsRepository } from './SavingsGoalTransactionsRepository';
export { SavingsGoalsRepository } from './SavingsGoalsRepository';
export { SettingsRepository } from './SettingsRepository';
export { TransactionsRepository } from './TransactionsRepository';

export interface Repositories {
  categories: CategoriesRepository;
  savingsGoals: SavingsGoalsRepository;
  settings: SettingsRepository;
  transactions: TransactionsRepository;
  budgets: BudgetsRepository;
  recurringTransactions: RecurringTransactionsRepository;
  savingsGoalTransactions: SavingsGoalTransactionsRepository;
}

export function createRepositories(db: Database, clock?: Clock): Repositories {
  const savingsGoals = new SavingsGoalsRepository(db, clock);
  const transactions = new TransactionsRepository(db, clock);

  return {
    categories: new CategoriesRepository(db, clock),
    savingsGoals,
    settings: new SettingsRepository(db, clock),
    transactions,
    budgets: new BudgetsRepository(db, clock),
    recurringTransactions: new RecurringTransactionsRepository(db, transactions, clock),
    savingsGoalTransactions: new SavingsGoalTransactionsRepository(db, savingsGoals, clock),
  };
}

/**
 * Re-emit every repository's data, e.g. after a sync applied server changes.
 */
export async function refreshRepositories(repositories: Repositories): Promise<void> {
  for (const repository of Object.values(repositories)) {
    await repository.refresh();
  }
}
