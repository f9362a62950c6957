import type { Clock } from '@/lib/clock';
import type { Database } from '@/lib/database';
import type { NewRecord, Transaction, TransactionType } from '@/lib/types';
import { ENTITY_DEFINITIONS } from '../schema';
import { BaseRepository, type EntityInput, type SyncFields } from './BaseRepository';

function monthRange(year: number, month: number): [string, string] {
  const pad = (value: number) => String(value).padStart(2, '0');
  const next = month === 12 ? { year: year + 1, month: 1 } : { year, month: month + 1 };
  return [`${year}-${pad(month)}-01`, `${next.year}-${pad(next.month)}-01`];
}

export class TransactionsRepository extends BaseRepository<Transaction> {
  constructor(db: Database, clock?: Clock) {
    super(db, ENTITY_DEFINITIONS.transaction, clock);
  }

  protected compose(input: EntityInput<Transaction>, sync: SyncFields): NewRecord<Transaction> {
    return { ...input, ...sync };
  }

  /**
   * Transactions dated within the month, newest first.
   */
  async getForMonth(year: number, month: number): Promise<Transaction[]> {
    const [start, end] = monthRange(year, month);
    return this.table.select('date >= $1 AND date < $2', [start, end], 'date DESC, id DESC');
  }

  async getByCategory(categoryId: number): Promise<Transaction[]> {
    return this.table.select('category_id = $1', [categoryId], 'date DESC, id DESC');
  }

  async getTotalForMonth(year: number, month: number, type: TransactionType = 'expense'): Promise<number> {
    const transactions = await this.getForMonth(year, month);
    return transactions.filter(t => t.type === type).reduce((sum, t) => sum + t.amount, 0);
  }
}
