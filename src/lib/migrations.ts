/**
 * Migration runner for the SQLite schema.
 *
 * Device and server share the same entity tables. On the device `user_id` and
 * `synced_at` stay NULL; the server stamps every row with its owner and with the
 * server time of its last write. Applied migrations are tracked in `_migrations`.
 */

import type { Database } from './database';

const MIGRATIONS: { name: string; sql: string }[] = [
  {
    name: '00001_initial_schema',
    sql: `
-- ============================================
-- Categories
-- ============================================
CREATE TABLE IF NOT EXISTS categories (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id TEXT,
  global_id TEXT NOT NULL,
  name TEXT NOT NULL,
  icon TEXT NOT NULL DEFAULT '',
  color TEXT NOT NULL DEFAULT '',
  default_budget REAL NOT NULL DEFAULT 0,
  type TEXT NOT NULL DEFAULT 'discretionary',
  updated_at TEXT NOT NULL,
  is_deleted INTEGER NOT NULL DEFAULT 0,
  synced_at TEXT
);

CREATE INDEX IF NOT EXISTS idx_categories_global ON categories(user_id, global_id);
CREATE INDEX IF NOT EXISTS idx_categories_synced ON categories(user_id, synced_at);

-- ============================================
-- Savings Goals
-- ============================================
CREATE TABLE IF NOT EXISTS savings_goals (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id TEXT,
  global_id TEXT NOT NULL,
  name TEXT NOT NULL,
  icon TEXT NOT NULL DEFAULT '',
  color TEXT NOT NULL DEFAULT '',
  goal_amount REAL NOT NULL DEFAULT 0,
  current_balance REAL NOT NULL DEFAULT 0,
  monthly_contribution REAL NOT NULL DEFAULT 0,
  start_date TEXT NOT NULL,
  target_date TEXT,
  status TEXT NOT NULL DEFAULT 'active',
  auto_contribute INTEGER NOT NULL DEFAULT 0,
  last_auto_contribute_date TEXT,
  updated_at TEXT NOT NULL,
  is_deleted INTEGER NOT NULL DEFAULT 0,
  synced_at TEXT
);

CREATE INDEX IF NOT EXISTS idx_savings_goals_global ON savings_goals(user_id, global_id);
CREATE INDEX IF NOT EXISTS idx_savings_goals_synced ON savings_goals(user_id, synced_at);

-- ============================================
-- Settings
-- ============================================
CREATE TABLE IF NOT EXISTS settings (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id TEXT,
  global_id TEXT NOT NULL,
  monthly_income REAL NOT NULL DEFAULT 0,
  has_completed_onboarding INTEGER NOT NULL DEFAULT 0,
  updated_at TEXT NOT NULL,
  is_deleted INTEGER NOT NULL DEFAULT 0,
  synced_at TEXT
);

CREATE INDEX IF NOT EXISTS idx_settings_global ON settings(user_id, global_id);
CREATE INDEX IF NOT EXISTS idx_settings_synced ON settings(user_id, synced_at);

-- ============================================
-- Transactions
-- ============================================
CREATE TABLE IF NOT EXISTS transactions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id TEXT,
  global_id TEXT NOT NULL,
  description TEXT NOT NULL DEFAULT '',
  amount REAL NOT NULL,
  date TEXT NOT NULL,
  category_id INTEGER,
  type TEXT NOT NULL DEFAULT 'expense',
  updated_at TEXT NOT NULL,
  is_deleted INTEGER NOT NULL DEFAULT 0,
  synced_at TEXT,
  FOREIGN KEY (category_id) REFERENCES categories(id)
);

CREATE INDEX IF NOT EXISTS idx_transactions_global ON transactions(user_id, global_id);
CREATE INDEX IF NOT EXISTS idx_transactions_synced ON transactions(user_id, synced_at);
CREATE INDEX IF NOT EXISTS idx_transactions_date ON transactions(date);
CREATE INDEX IF NOT EXISTS idx_transactions_category ON transactions(category_id);

-- ============================================
-- Budgets
-- ============================================
CREATE TABLE IF NOT EXISTS budgets (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id TEXT,
  global_id TEXT NOT NULL,
  category_id INTEGER,
  amount REAL NOT NULL,
  month INTEGER NOT NULL,
  year INTEGER NOT NULL,
  updated_at TEXT NOT NULL,
  is_deleted INTEGER NOT NULL DEFAULT 0,
  synced_at TEXT,
  FOREIGN KEY (category_id) REFERENCES categories(id)
);

CREATE INDEX IF NOT EXISTS idx_budgets_global ON budgets(user_id, global_id);
CREATE INDEX IF NOT EXISTS idx_budgets_synced ON budgets(user_id, synced_at);
CREATE INDEX IF NOT EXISTS idx_budgets_period ON budgets(year, month);

-- ============================================
-- Recurring Transactions
-- ============================================
CREATE TABLE IF NOT EXISTS recurring_transactions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id TEXT,
  global_id TEXT NOT NULL,
  description TEXT NOT NULL DEFAULT '',
  amount REAL NOT NULL,
  category_id INTEGER,
  type TEXT NOT NULL DEFAULT 'expense',
  frequency TEXT NOT NULL DEFAULT 'monthly',
  day_of_month INTEGER NOT NULL DEFAULT 1,
  start_date TEXT NOT NULL,
  next_due_date TEXT NOT NULL,
  is_active INTEGER NOT NULL DEFAULT 1,
  updated_at TEXT NOT NULL,
  is_deleted INTEGER NOT NULL DEFAULT 0,
  synced_at TEXT,
  FOREIGN KEY (category_id) REFERENCES categories(id)
);

CREATE INDEX IF NOT EXISTS idx_recurring_transactions_global ON recurring_transactions(user_id, global_id);
CREATE INDEX IF NOT EXISTS idx_recurring_transactions_synced ON recurring_transactions(user_id, synced_at);

-- ============================================
-- Savings Goal Transactions
-- ============================================
CREATE TABLE IF NOT EXISTS savings_goal_transactions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id TEXT,
  global_id TEXT NOT NULL,
  savings_goal_id INTEGER,
  date TEXT NOT NULL,
  amount REAL NOT NULL,
  type TEXT NOT NULL DEFAULT 'contribution',
  note TEXT NOT NULL DEFAULT '',
  updated_at TEXT NOT NULL,
  is_deleted INTEGER NOT NULL DEFAULT 0,
  synced_at TEXT,
  FOREIGN KEY (savings_goal_id) REFERENCES savings_goals(id)
);

CREATE INDEX IF NOT EXISTS idx_savings_goal_transactions_global ON savings_goal_transactions(user_id, global_id);
CREATE INDEX IF NOT EXISTS idx_savings_goal_transactions_synced ON savings_goal_transactions(user_id, synced_at);
CREATE INDEX IF NOT EXISTS idx_savings_goal_transactions_goal ON savings_goal_transactions(savings_goal_id);

-- ============================================
-- Auth State (device only, single row)
-- ============================================
CREATE TABLE IF NOT EXISTS auth_state (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  user_id TEXT,
  email TEXT,
  access_token TEXT,
  refresh_token TEXT,
  expires_at TEXT,
  last_sync_at TEXT
);
`,
  },
];

/**
 * Check which migrations have been applied.
 */
async function getAppliedMigrations(db: Database): Promise<Set<string>> {
  const result = await db.select<{ name: string }>('SELECT name FROM _migrations');
  return new Set(result.map(r => r.name));
}

/**
 * Mark a migration as applied.
 */
async function markMigrationApplied(db: Database, name: string): Promise<void> {
  const now = new Date().toISOString();
  await db.execute('INSERT INTO _migrations (name, applied_at) VALUES ($1, $2)', [name, now]);
}

/**
 * Split SQL into individual statements, handling semicolons inside strings.
 * Also strips leading comment lines from each statement.
 */
export function splitStatements(sql: string): string[] {
  const statements: string[] = [];
  let current = '';
  let inString = false;
  let stringChar = '';

  for (let i = 0; i < sql.length; i++) {
    const char = sql[i];

    // Handle string boundaries
    if (char === "'" || char === '"') {
      if (!inString) {
        inString = true;
        stringChar = char;
      } else if (char === stringChar) {
        inString = false;
      }
    }

    // Split on semicolons outside strings
    if (char === ';' && !inString) {
      const stmt = current.trim();
      if (stmt) {
        statements.push(stmt);
      }
      current = '';
    } else {
      current += char;
    }
  }

  const final = current.trim();
  if (final) {
    statements.push(final);
  }

  return statements
    .map(stmt => {
      const lines = stmt.split('\n');
      let startIndex = 0;
      while (startIndex < lines.length) {
        const trimmed = lines[startIndex].trim();
        if (trimmed === '' || trimmed.startsWith('--')) {
          startIndex++;
        } else {
          break;
        }
      }
      return lines.slice(startIndex).join('\n').trim();
    })
    .filter(stmt => stmt.length > 0);
}

/**
 * Run pending migrations against the given database.
 */
export async function runMigrations(db: Database): Promise<{ applied: string[]; errors: string[] }> {
  const result: { applied: string[]; errors: string[] } = { applied: [], errors: [] };

  await db.execute(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL
    )
  `);

  const appliedMigrations = await getAppliedMigrations(db);

  for (const migration of MIGRATIONS) {
    if (appliedMigrations.has(migration.name)) {
      continue;
    }

    try {
      for (const statement of splitStatements(migration.sql)) {
        await db.execute(statement);
      }
      await markMigrationApplied(db, migration.name);
      result.applied.push(migration.name);
      console.log(`[Migrations] Applied: ${migration.name}`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Migrations] Failed: ${migration.name}`, error);
      result.errors.push(`${migration.name}: ${message}`);
      break;
    }
  }

  return result;
}
