/**
 * Wire format for POST /api/sync.
 *
 * Records travel in camelCase keyed by global id, with foreign keys as global
 * references. Both ends validate bodies against these schemas.
 */

import { z } from 'zod';
import { NIL_GLOBAL_ID } from './types';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const globalIdSchema = z
  .string()
  .regex(UUID_PATTERN, 'Invalid global id')
  .transform(value => value.toLowerCase());

const globalReferenceSchema = globalIdSchema.default(NIL_GLOBAL_ID);

// Normalised to UTC with millisecond precision
export const timestampSchema = z
  .string()
  .datetime({ offset: true })
  .transform(value => new Date(value).toISOString());

const dateSchema = z.string().regex(DATE_PATTERN, 'Expected YYYY-MM-DD');

const syncFields = {
  globalId: globalIdSchema,
  updatedAt: timestampSchema,
  isDeleted: z.boolean().default(false),
};

export const categoryWireSchema = z.object({
  ...syncFields,
  name: z.string(),
  icon: z.string().default(''),
  color: z.string().default(''),
  defaultBudget: z.number().default(0),
  type: z.enum(['fixed', 'discretionary']),
});

export const savingsGoalWireSchema = z.object({
  ...syncFields,
  name: z.string(),
  icon: z.string().default(''),
  color: z.string().default(''),
  goalAmount: z.number(),
  currentBalance: z.number().default(0),
  monthlyContribution: z.number().default(0),
  startDate: dateSchema,
  targetDate: dateSchema.nullable().default(null),
  status: z.enum(['active', 'paused', 'completed']).default('active'),
  autoContribute: z.boolean().default(false),
  lastAutoContributeDate: dateSchema.nullable().default(null),
});

export const settingsWireSchema = z.object({
  ...syncFields,
  monthlyIncome: z.number(),
  hasCompletedOnboarding: z.boolean().default(false),
});

export const transactionWireSchema = z.object({
  ...syncFields,
  description: z.string().default(''),
  amount: z.number(),
  date: dateSchema,
  categoryGlobalId: globalReferenceSchema,
  type: z.enum(['expense', 'income']),
});

export const budgetWireSchema = z.object({
  ...syncFields,
  categoryGlobalId: globalReferenceSchema,
  amount: z.number(),
  month: z.number().int().min(1).max(12),
  year: z.number().int(),
});

export const recurringTransactionWireSchema = z.object({
  ...syncFields,
  description: z.string().default(''),
  amount: z.number(),
  categoryGlobalId: globalReferenceSchema,
  type: z.enum(['expense', 'income']),
  frequency: z.enum(['weekly', 'biweekly', 'monthly', 'yearly']),
  dayOfMonth: z.number().int().min(1).max(31),
  startDate: dateSchema,
  nextDueDate: dateSchema,
  isActive: z.boolean().default(true),
});

export const savingsGoalTransactionWireSchema = z.object({
  ...syncFields,
  savingsGoalGlobalId: globalReferenceSchema,
  date: dateSchema,
  amount: z.number(),
  type: z.enum(['contribution', 'withdrawal']),
  note: z.string().default(''),
});

export const syncPayloadSchema = z.object({
  categories: z.array(categoryWireSchema).default([]),
  savingsGoals: z.array(savingsGoalWireSchema).default([]),
  settings: z.array(settingsWireSchema).default([]),
  transactions: z.array(transactionWireSchema).default([]),
  budgets: z.array(budgetWireSchema).default([]),
  recurringTransactions: z.array(recurringTransactionWireSchema).default([]),
  savingsGoalTransactions: z.array(savingsGoalTransactionWireSchema).default([]),
});

export const syncRequestSchema = z.object({
  lastSyncedAt: timestampSchema.nullable().default(null),
  clientChanges: syncPayloadSchema.default({}),
});

export const syncResponseSchema = z.object({
  serverChanges: syncPayloadSchema,
  syncedAt: timestampSchema,
});

export type CategoryWire = z.infer<typeof categoryWireSchema>;
export type SavingsGoalWire = z.infer<typeof savingsGoalWireSchema>;
export type SettingsWire = z.infer<typeof settingsWireSchema>;
export type TransactionWire = z.infer<typeof transactionWireSchema>;
export type BudgetWire = z.infer<typeof budgetWireSchema>;
export type RecurringTransactionWire = z.infer<typeof recurringTransactionWireSchema>;
export type SavingsGoalTransactionWire = z.infer<typeof savingsGoalTransactionWireSchema>;

export type SyncPayload = z.infer<typeof syncPayloadSchema>;
export type SyncRequest = z.infer<typeof syncRequestSchema>;
export type SyncResponse = z.infer<typeof syncResponseSchema>;

export function emptyPayload(): SyncPayload {
  return {
    categories: [],
    savingsGoals: [],
    settings: [],
    transactions: [],
    budgets: [],
    recurringTransactions: [],
    savingsGoalTransactions: [],
  };
}

export function countPayload(payload: SyncPayload): number {
  return (
    payload.categories.length +
    payload.savingsGoals.length +
    payload.settings.length +
    payload.transactions.length +
    payload.budgets.length +
    payload.recurringTransactions.length +
    payload.savingsGoalTransactions.length
  );
}

/**
 * Flatten zod issues into one readable line.
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
