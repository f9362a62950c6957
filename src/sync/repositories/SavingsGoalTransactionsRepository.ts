/**
 * SavingsGoalTransactionsRepository
 *
 * Contributions to and withdrawals from a savings goal. Adding or deleting one moves
 * the goal's balance with it.
 */

import type { Clock } from '@/lib/clock';
import type { Database } from '@/lib/database';
import type { NewRecord, SavingsGoalTransaction } from '@/lib/types';
import { ENTITY_DEFINITIONS } from '../schema';
import { BaseRepository, type EntityInput, type SyncFields } from './BaseRepository';
import type { SavingsGoalsRepository } from './SavingsGoalsRepository';

function signedAmount(transaction: Pick<SavingsGoalTransaction, 'amount' | 'type'>): number {
  return transaction.type === 'contribution' ? transaction.amount : -transaction.amount;
}

export class SavingsGoalTransactionsRepository extends BaseRepository<SavingsGoalTransaction> {
  constructor(
    db: Database,
    private readonly goals: SavingsGoalsRepository,
    clock?: Clock
  ) {
    super(db, ENTITY_DEFINITIONS.savingsGoalTransaction, clock);
  }

  protected compose(
    input: EntityInput<SavingsGoalTransaction>,
    sync: SyncFields
  ): NewRecord<SavingsGoalTransaction> {
    return { ...input, ...sync };
  }

  async create(input: EntityInput<SavingsGoalTransaction>): Promise<SavingsGoalTransaction> {
    const created = await super.create(input);
    if (created.savings_goal_id !== null) {
      await this.goals.adjustBalance(created.savings_goal_id, signedAmount(created));
    }
    return created;
  }

  /**
   * Soft delete the entry and reverse its effect on the goal's balance.
   */
  async delete(id: number): Promise<boolean> {
    const existing = await this.getById(id);
    if (!existing) return false;

    await super.delete(id);
    if (existing.savings_goal_id !== null) {
      await this.goals.adjustBalance(existing.savings_goal_id, -signedAmount(existing));
    }
    return true;
  }

  async getByGoal(savingsGoalId: number): Promise<SavingsGoalTransaction[]> {
    return this.table.select('savings_goal_id = $1', [savingsGoalId], 'date DESC, id DESC');
  }

  /**
   * Contributions minus withdrawals for one goal.
   */
  async getNetAmount(savingsGoalId: number): Promise<number> {
    const transactions = await this.getByGoal(savingsGoalId);
    return transactions.reduce((sum, t) => sum + signedAmount(t), 0);
  }
}
