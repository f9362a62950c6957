/**
 * ChangeCollector
 *
 * Builds the outbound payload: every row changed after the watermark, deleted rows
 * included, with local foreign keys rewritten to the parent's global id.
 */

import type { SyncStore } from '../datasources/types';
import {
  budgetToWire,
  categoryToWire,
  recurringTransactionToWire,
  savingsGoalToWire,
  savingsGoalTransactionToWire,
  settingsToWire,
  transactionToWire,
} from '../mappers';
import type { SyncPayload } from '../wire';

export class ChangeCollector {
  constructor(private readonly store: SyncStore) {}

  async collect(since: string | null): Promise<SyncPayload> {
    // Unfiltered lookups so children of deleted parents still resolve
    const categoryGlobalIds = await this.store.table('category').globalIdsByLocalId();
    const savingsGoalGlobalIds = await this.store.table('savingsGoal').globalIdsByLocalId();

    const categories = await this.store.table('category').listChangedSince(since);
    const savingsGoals = await this.store.table('savingsGoal').listChangedSince(since);
    const settings = await this.store.table('settings').listChangedSince(since);
    const transactions = await this.store.table('transaction').listChangedSince(since);
    const budgets = await this.store.table('budget').listChangedSince(since);
    const recurringTransactions = await this.store.table('recurringTransaction').listChangedSince(since);
    const savingsGoalTransactions = await this.store.table('savingsGoalTransaction').listChangedSince(since);

    return {
      categories: categories.map(categoryToWire),
      savingsGoals: savingsGoals.map(savingsGoalToWire),
      settings: settings.map(settingsToWire),
      transactions: transactions.map(row => transactionToWire(row, categoryGlobalIds)),
      budgets: budgets.map(row => budgetToWire(row, categoryGlobalIds)),
      recurringTransactions: recurringTransactions.map(row => recurringTransactionToWire(row, categoryGlobalIds)),
      savingsGoalTransactions: savingsGoalTransactions.map(row =>
        savingsGoalTransactionToWire(row, savingsGoalGlobalIds)
      ),
    };
  }
}
