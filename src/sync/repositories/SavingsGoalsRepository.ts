/**
 * SavingsGoalsRepository
 *
 * Savings goals and their running balance.
 */

import type { Clock } from '@/lib/clock';
import type { Database } from '@/lib/database';
import type { NewRecord, SavingsGoal, SavingsGoalStatus } from '@/lib/types';
import { ENTITY_DEFINITIONS } from '../schema';
import { BaseRepository, type EntityInput, type SyncFields } from './BaseRepository';

export class SavingsGoalsRepository extends BaseRepository<SavingsGoal> {
  constructor(db: Database, clock?: Clock) {
    super(db, ENTITY_DEFINITIONS.savingsGoal, clock);
  }

  protected compose(input: EntityInput<SavingsGoal>, sync: SyncFields): NewRecord<SavingsGoal> {
    return { ...input, ...sync };
  }

  /**
   * Goals still being saved for, nearest target date first. Goals without one come last.
   */
  async getActive(): Promise<SavingsGoal[]> {
    return this.getByStatus('active');
  }

  async getByStatus(status: SavingsGoalStatus): Promise<SavingsGoal[]> {
    return this.table.select('status = $1', [status], 'target_date IS NULL, target_date ASC, id ASC');
  }

  /**
   * Add to (or, with a negative delta, take from) the goal's balance. A goal whose
   * balance reaches its amount is marked completed; a completed goal that drops below
   * it is active again.
   */
  async adjustBalance(id: number, delta: number): Promise<SavingsGoal | null> {
    const goal = await this.getById(id);
    if (!goal) return null;

    const balance = goal.current_balance + delta;
    let status: SavingsGoalStatus = goal.status;
    if (balance >= goal.goal_amount) {
      status = 'completed';
    } else if (goal.status === 'completed') {
      status = 'active';
    }
    return this.update(id, { current_balance: balance, status });
  }
}
