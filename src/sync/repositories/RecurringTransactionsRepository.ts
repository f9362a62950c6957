import { parseISO } from 'date-fns';
import type { Clock } from '@/lib/clock';
import type { Database } from '@/lib/database';
import { nextDueDate, toDateString } from '@/lib/recurrence';
import type { NewRecord, RecurringTransaction } from '@/lib/types';
import { ENTITY_DEFINITIONS } from '../schema';
import { BaseRepository, type EntityInput, type SyncFields } from './BaseRepository';
import type { TransactionsRepository } from './TransactionsRepository';

export class RecurringTransactionsRepository extends BaseRepository<RecurringTransaction> {
  constructor(
    db: Database,
    private readonly transactions: TransactionsRepository,
    clock?: Clock
  ) {
    super(db, ENTITY_DEFINITIONS.recurringTransaction, clock);
  }

  protected compose(input: EntityInput<RecurringTransaction>, sync: SyncFields): NewRecord<RecurringTransaction> {
    return { ...input, ...sync };
  }

  async getActive(): Promise<RecurringTransaction[]> {
    return this.table.select('is_active = 1', [], 'next_due_date ASC, id ASC');
  }

  /**
   * Active entries due on or before the given date (YYYY-MM-DD).
   */
  async getDue(date: string): Promise<RecurringTransaction[]> {
    return this.table.select('is_active = 1 AND next_due_date <= $1', [date], 'next_due_date ASC, id ASC');
  }

  /**
   * Book every occurrence due on or before `today` as a transaction and move each
   * entry's next due date past it. Missed periods are caught up one by one.
   * Returns the number of transactions created.
   */
  async processDue(today: string = toDateString(parseISO(this.clock.now()))): Promise<number> {
    let created = 0;

    for (const recurring of await this.getDue(today)) {
      let dueDate = recurring.next_due_date;
      while (dueDate <= today) {
        await this.transactions.create({
          description: recurring.description,
          amount: recurring.amount,
          date: dueDate,
          category_id: recurring.category_id,
          type: recurring.type,
        });
        created++;
        dueDate = nextDueDate(dueDate, recurring.frequency, recurring.day_of_month);
      }

      await this.update(recurring.id, { next_due_date: dueDate });
    }

    if (created > 0) {
      console.info(`[Recurring] Created ${created} transaction(s) due by ${today}`);
    }
    return created;
  }
}
