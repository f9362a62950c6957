import { randomUUID } from 'node:crypto';

// Database types matching the SQLite schema (shared by device and server stores)

export type CategoryType = 'fixed' | 'discretionary';
export type TransactionType = 'expense' | 'income';
export type RecurrenceFrequency = 'weekly' | 'biweekly' | 'monthly' | 'yearly';
export type SavingsGoalStatus = 'active' | 'paused' | 'completed';
export type SavingsGoalTransactionType = 'contribution' | 'withdrawal';

// Columns every syncable table carries
export interface SyncableEntity {
  id: number;
  global_id: string;
  updated_at: string;
  is_deleted: number;
}

export interface Category extends SyncableEntity {
  name: string;
  icon: string;
  color: string;
  default_budget: number;
  type: CategoryType;
}

export interface SavingsGoal extends SyncableEntity {
  name: string;
  icon: string;
  color: string;
  goal_amount: number;
  current_balance: number;
  monthly_contribution: number;
  start_date: string; // "2026-01-15"
  target_date: string | null;
  status: SavingsGoalStatus;
  auto_contribute: number;
  last_auto_contribute_date: string | null;
}

export interface Settings extends SyncableEntity {
  monthly_income: number;
  has_completed_onboarding: number;
}

export interface Transaction extends SyncableEntity {
  description: string;
  amount: number;
  date: string;
  category_id: number | null;
  type: TransactionType;
}

export interface Budget extends SyncableEntity {
  category_id: number | null;
  amount: number;
  month: number; // 1-12
  year: number;
}

export interface RecurringTransaction extends SyncableEntity {
  description: string;
  amount: number;
  category_id: number | null;
  type: TransactionType;
  frequency: RecurrenceFrequency;
  day_of_month: number;
  start_date: string;
  next_due_date: string;
  is_active: number;
}

export interface SavingsGoalTransaction extends SyncableEntity {
  savings_goal_id: number | null;
  date: string;
  amount: number;
  type: SavingsGoalTransactionType;
  note: string;
}

// A row before the store has assigned its surrogate key
export type NewRecord<T extends SyncableEntity> = Omit<T, 'id'> & Omit<SyncableEntity, 'id'>;

// Utility functions
export function generateId(): string {
  return randomUUID();
}

// Canonical UTC form used for every stored and transmitted timestamp
export function toTimestamp(value: string | Date): string {
  return new Date(value).toISOString();
}

export function getCurrentDate(now: Date = new Date()): string {
  return now.toISOString().split('T')[0];
}

// Auth types
export interface AuthSession {
  userId: string;
  email: string;
  accessToken: string;
  refreshToken: string;
  expiresAt: string;
}

export interface LocalAuthState {
  id: number;
  user_id: string | null;
  email: string | null;
  access_token: string | null;
  refresh_token: string | null;
  expires_at: string | null;
  last_sync_at: string | null;
}
