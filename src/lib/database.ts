/**
 * SQLite database backed by sql.js (SQLite compiled to WASM).
 *
 * The same wrapper serves the device-local change ledger and the server's shared
 * store. Data lives in memory and, when a file path is given, is exported to disk
 * after writes.
 */

import { readFile, writeFile } from 'node:fs/promises';
import initSqlJs, { type Database as SqlJsDatabase, type SqlJsStatic, type SqlValue } from 'sql.js';
import { runMigrations } from './migrations';

export type { SqlValue };

export interface QueryResult {
  rowsAffected: number;
  lastInsertId: number;
}

// Database interface shared by every store
export interface Database {
  execute(query: string, params?: SqlValue[]): Promise<QueryResult>;
  select<T extends object>(query: string, params?: SqlValue[]): Promise<T[]>;
  flush(): Promise<void>;
  close(): Promise<void>;
}

const SAVE_DEBOUNCE_MS = 100;

let sqlJsPromise: Promise<SqlJsStatic> | null = null;

function loadSqlJs(): Promise<SqlJsStatic> {
  if (!sqlJsPromise) {
    sqlJsPromise = initSqlJs();
  }
  return sqlJsPromise;
}

/**
 * Convert PostgreSQL-style parameters ($1, $2) to SQLite-style (?)
 * and reorder params array accordingly.
 */
export function convertParams(query: string, params: SqlValue[]): { query: string; params: SqlValue[] } {
  const paramRefs: number[] = [];
  const regex = /\$(\d+)/g;
  let match: RegExpExecArray | null;

  while ((match = regex.exec(query)) !== null) {
    paramRefs.push(parseInt(match[1], 10));
  }

  if (paramRefs.length === 0) {
    return { query, params };
  }

  // Build new params array in order of appearance
  const newParams = paramRefs.map(paramNum => {
    if (paramNum < 1 || paramNum > params.length) {
      throw new Error(`Missing value for parameter $${paramNum}`);
    }
    return params[paramNum - 1];
  });

  return { query: query.replace(/\$\d+/g, '?'), params: newParams };
}

/**
 * Transform sql.js results to array of objects.
 * sql.js returns: [{ columns: ['id', 'name'], values: [[1, 'foo'], [2, 'bar']] }]
 * We need: [{id: 1, name: 'foo'}, {id: 2, name: 'bar'}]
 */
function transformResults<T>(results: { columns: string[]; values: SqlValue[][] }[]): T[] {
  if (results.length === 0) return [];

  const { columns, values } = results[0];
  return values.map(row => {
    const obj: Record<string, SqlValue> = {};
    columns.forEach((col, i) => {
      obj[col] = row[i];
    });
    return obj as T;
  });
}

export class SqliteDatabase implements Database {
  private saveTimeout: ReturnType<typeof setTimeout> | null = null;
  private dirty = false;

  private constructor(
    private readonly db: SqlJsDatabase,
    private readonly filePath: string | null
  ) {}

  /**
   * Open a database. Without a path the database is purely in memory.
   */
  static async open(filePath: string | null = null): Promise<SqliteDatabase> {
    const SQL = await loadSqlJs();
    const existing = filePath ? await readExisting(filePath) : null;
    const db = existing ? new SQL.Database(existing) : new SQL.Database();
    return new SqliteDatabase(db, filePath);
  }

  /**
   * Execute a SQL statement (INSERT, UPDATE, DELETE, CREATE TABLE, etc.).
   */
  async execute(query: string, params: SqlValue[] = []): Promise<QueryResult> {
    const converted = convertParams(query, params);

    try {
      this.db.run(converted.query, converted.params);
      const rowsAffected = this.db.getRowsModified();
      const lastInsertId = this.lastInsertRowId();

      this.scheduleSave();

      return { rowsAffected, lastInsertId };
    } catch (error) {
      console.error('SQL execute error:', error, { query, params });
      throw error;
    }
  }

  /**
   * Select records from the database.
   */
  async select<T extends object>(query: string, params: SqlValue[] = []): Promise<T[]> {
    const converted = convertParams(query, params);

    try {
      return transformResults<T>(this.db.exec(converted.query, converted.params));
    } catch (error) {
      console.error('SQL select error:', error, { query, params });
      throw error;
    }
  }

  /**
   * Write pending changes to disk now.
   */
  async flush(): Promise<void> {
    if (this.saveTimeout) {
      clearTimeout(this.saveTimeout);
      this.saveTimeout = null;
    }
    await this.saveToFile();
  }

  async close(): Promise<void> {
    await this.flush();
    this.db.close();
  }

  private lastInsertRowId(): number {
    const result = this.db.exec('SELECT last_insert_rowid()');
    const value = result[0]?.values[0]?.[0];
    return typeof value === 'number' ? value : 0;
  }

  private scheduleSave(): void {
    if (!this.filePath) return;
    this.dirty = true;

    if (this.saveTimeout) {
      clearTimeout(this.saveTimeout);
    }
    this.saveTimeout = setTimeout(() => {
      this.saveTimeout = null;
      this.saveToFile().catch(error => console.error('Failed to save database:', error));
    }, SAVE_DEBOUNCE_MS);
  }

  private async saveToFile(): Promise<void> {
    if (!this.filePath || !this.dirty) return;
    this.dirty = false;
    await writeFile(this.filePath, this.db.export());
  }
}

async function readExisting(filePath: string): Promise<Uint8Array | null> {
  try {
    return await readFile(filePath);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Open a database and bring its schema up to date.
 */
export async function openDatabase(filePath: string | null = null): Promise<Database> {
  const database = await SqliteDatabase.open(filePath);
  const { errors } = await runMigrations(database);
  if (errors.length > 0) {
    throw new Error(`Database migration failed: ${errors.join('; ')}`);
  }
  return database;
}

let dbPromise: Promise<Database> | null = null;

/**
 * Get the app's device database, opening it on first use.
 */
export function getDatabase(filePath: string | null = null): Promise<Database> {
  if (!dbPromise) {
    dbPromise = openDatabase(filePath);
  }
  return dbPromise;
}

/**
 * Close and forget the shared database.
 */
export async function resetDatabase(): Promise<void> {
  if (dbPromise) {
    const db = await dbPromise;
    dbPromise = null;
    await db.close();
  }
}
