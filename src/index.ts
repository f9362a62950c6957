export * from './sync';
export * from './server';

export { AuthStateWatermarkStore, LocalSessionCredentials, saveLocalAuthState } from './lib/auth';
export { systemClock, type Clock } from './lib/clock';
export { loadConfig, type AppConfig } from './lib/config';
export { openDatabase, SqliteDatabase, type Database } from './lib/database';
export { nextDueDate, nextMonthlyDate } from './lib/recurrence';
export {
  generateId,
  type AuthSession,
  type Budget,
  type Category,
  type CategoryType,
  type NewRecord,
  type RecurringTransaction,
  type RecurrenceFrequency,
  type SavingsGoal,
  type SavingsGoalStatus,
  type SavingsGoalTransaction,
  type SavingsGoalTransactionType,
  type Settings,
  type SyncableEntity,
  type Transaction,
  type TransactionType,
} from './lib/types';
