/**
 * SqliteDataSource
 *
 * Generic SQLite data source for one syncable table.
 * On the device it is unscoped. On the server every query is limited to one owner and
 * every write records the server's change stamp in `synced_at`.
 */

import type { Database, SqlValue } from '@/lib/database';
import type { NewRecord, SyncableEntity } from '@/lib/types';
import { ENTITY_DEFINITIONS, type EntityDefinition } from '../schema';
import type { EntityTables } from './types';

export interface OwnerScope {
  ownerId: string;
  // Server time recorded on every row written through this scope
  changeStamp: string;
}

export function toSqlValue(value: unknown): SqlValue {
  if (value === undefined || value === null) return null;
  if (typeof value === 'string' || typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (value instanceof Uint8Array) return value;
  throw new TypeError(`Unsupported column value: ${typeof value}`);
}

export class SqliteDataSource<T extends SyncableEntity> {
  private readonly selectList: string;

  constructor(
    private readonly db: Database,
    readonly definition: EntityDefinition<T>,
    private readonly scope: OwnerScope | null = null
  ) {
    this.selectList = ['id', ...definition.columns].join(', ');
  }

  get tableName(): string {
    return this.definition.tableName;
  }

  // ============ Reads ============

  async getById(id: number): Promise<T | null> {
    const where = this.where('id = $1', [id]);
    const results = await this.db.select<T>(
      `SELECT ${this.selectList} FROM ${this.tableName} WHERE ${where.clause}`,
      where.params
    );
    return results[0] ?? null;
  }

  /**
   * Get all rows, optionally including soft-deleted ones.
   */
  async getAll(includeDeleted: boolean = false): Promise<T[]> {
    const where = this.where(includeDeleted ? '1 = 1' : 'is_deleted = 0', []);
    return this.db.select<T>(
      `SELECT ${this.selectList} FROM ${this.tableName} WHERE ${where.clause} ORDER BY id ASC`,
      where.params
    );
  }

  /**
   * Active rows matching every given column value.
   */
  async query(filter: Partial<NewRecord<T>>): Promise<T[]> {
    const conditions: string[] = ['is_deleted = 0'];
    const params: SqlValue[] = [];

    for (const column of this.definition.columns) {
      if (!(column in filter)) continue;
      params.push(toSqlValue(filter[column]));
      conditions.push(`${column} = $${params.length}`);
    }

    const where = this.where(conditions.join(' AND '), params);
    return this.db.select<T>(
      `SELECT ${this.selectList} FROM ${this.tableName} WHERE ${where.clause} ORDER BY id ASC`,
      where.params
    );
  }

  /**
   * Active rows matching a raw condition. Placeholders start at $1.
   */
  async select(condition: string, params: SqlValue[] = [], orderBy: string = 'id ASC'): Promise<T[]> {
    const where = this.where(`is_deleted = 0 AND (${condition})`, params);
    return this.db.select<T>(
      `SELECT ${this.selectList} FROM ${this.tableName} WHERE ${where.clause} ORDER BY ${orderBy}`,
      where.params
    );
  }

  /**
   * Rows changed after the watermark, deleted ones included. A null watermark
   * returns the full history.
   */
  async listChangedSince(since: string | null): Promise<T[]> {
    // The server compares its own write stamps; the device compares UpdatedAt.
    const column = this.scope ? 'synced_at' : 'updated_at';
    const where = since === null ? this.where('1 = 1', []) : this.where(`${column} > $1`, [since]);
    return this.db.select<T>(
      `SELECT ${this.selectList} FROM ${this.tableName} WHERE ${where.clause} ORDER BY id ASC`,
      where.params
    );
  }

  /**
   * Latest row carrying the global id, deleted or not.
   */
  async findByGlobalId(globalId: string): Promise<T | null> {
    const where = this.where('global_id = $1', [globalId]);
    const results = await this.db.select<T>(
      `SELECT ${this.selectList} FROM ${this.tableName} WHERE ${where.clause} ORDER BY id DESC LIMIT 1`,
      where.params
    );
    return results[0] ?? null;
  }

  async count(): Promise<number> {
    const where = this.where('is_deleted = 0', []);
    const result = await this.db.select<{ count: number }>(
      `SELECT COUNT(*) as count FROM ${this.tableName} WHERE ${where.clause}`,
      where.params
    );
    return result[0]?.count ?? 0;
  }

  // ============ Foreign Key Lookup Tables ============

  /**
   * LocalId -> GlobalId for every row, deleted ones included.
   */
  async globalIdsByLocalId(): Promise<Map<number, string>> {
    const rows = await this.selectIdentities();
    return new Map(rows.map(row => [row.id, row.global_id]));
  }

  /**
   * GlobalId -> LocalId for every row, deleted ones included. When a global id
   * appears twice the highest local id wins.
   */
  async localIdsByGlobalId(): Promise<Map<string, number>> {
    const rows = await this.selectIdentities();
    return new Map(rows.map(row => [row.global_id, row.id]));
  }

  // ============ Writes ============

  async insert(record: NewRecord<T>): Promise<number> {
    const columns: string[] = [...this.definition.columns];
    const values: SqlValue[] = this.definition.columns.map(column => toSqlValue(record[column]));

    if (this.scope) {
      columns.push('user_id', 'synced_at');
      values.push(this.scope.ownerId, this.scope.changeStamp);
    }

    const placeholders = values.map((_, i) => `$${i + 1}`).join(', ');
    const result = await this.db.execute(
      `INSERT INTO ${this.tableName} (${columns.join(', ')}) VALUES (${placeholders})`,
      values
    );
    return result.lastInsertId;
  }

  /**
   * Write the given columns. When `updatedAt` is passed it replaces any UpdatedAt in
   * the changes.
   */
  async update(id: number, changes: Partial<NewRecord<T>>, updatedAt?: string): Promise<void> {
    const assignments: string[] = [];
    const params: SqlValue[] = [];

    for (const column of this.definition.columns) {
      const name: string = column;
      if (!(column in changes)) continue;
      if (updatedAt !== undefined && name === 'updated_at') continue;
      params.push(toSqlValue(changes[column]));
      assignments.push(`${column} = $${params.length}`);
    }
    if (updatedAt !== undefined) {
      params.push(updatedAt);
      assignments.push(`updated_at = $${params.length}`);
    }

    if (assignments.length === 0) return;
    await this.executeUpdate(assignments, params, 'id', id);
  }

  /**
   * Overwrite every column of the row with this local id, inserting it under that id
   * if it does not exist.
   */
  async upsertByLocalId(id: number, record: NewRecord<T>): Promise<void> {
    const existing = await this.getById(id);
    if (existing) {
      await this.update(id, record);
      return;
    }

    const columns: string[] = ['id', ...this.definition.columns];
    const values: SqlValue[] = [id, ...this.definition.columns.map(column => toSqlValue(record[column]))];
    if (this.scope) {
      columns.push('user_id', 'synced_at');
      values.push(this.scope.ownerId, this.scope.changeStamp);
    }

    const placeholders = values.map((_, i) => `$${i + 1}`).join(', ');
    await this.db.execute(
      `INSERT INTO ${this.tableName} (${columns.join(', ')}) VALUES (${placeholders})`,
      values
    );
  }

  async softDelete(id: number, updatedAt: string): Promise<void> {
    await this.executeUpdate(['is_deleted = 1', 'updated_at = $1'], [updatedAt], 'id', id);
  }

  /**
   * Physically remove a row. Only used for exact duplicates.
   */
  async hardDelete(id: number): Promise<void> {
    const where = this.where('id = $1', [id]);
    await this.db.execute(`DELETE FROM ${this.tableName} WHERE ${where.clause}`, where.params);
  }

  /**
   * Move every row pointing at one parent over to another, bumping UpdatedAt so the
   * move is synced. Returns the number of rows moved.
   */
  async repoint(fromParentId: number, toParentId: number, updatedAt: string): Promise<number> {
    const parent = this.definition.parent;
    if (!parent) {
      throw new Error(`${this.tableName} has no parent reference`);
    }

    return this.executeUpdate(
      [`${parent.column} = $1`, 'updated_at = $2'],
      [toParentId, updatedAt],
      parent.column,
      fromParentId
    );
  }

  /**
   * Local id of the active fallback row, created when missing.
   */
  async getOrCreateFallback(globalId: string, now: string): Promise<{ id: number; created: boolean }> {
    const fallback = this.definition.fallback;
    if (!fallback) {
      throw new Error(`${this.tableName} has no fallback record`);
    }

    const where = this.where('name = $1 AND is_deleted = 0', [fallback.name]);
    const existing = await this.db.select<{ id: number }>(
      `SELECT id FROM ${this.tableName} WHERE ${where.clause} ORDER BY id ASC LIMIT 1`,
      where.params
    );
    if (existing[0]) {
      return { id: existing[0].id, created: false };
    }

    const id = await this.insert(fallback.create(globalId, now));
    return { id, created: true };
  }

  // ============ Private Methods ============

  private async selectIdentities(): Promise<{ id: number; global_id: string }[]> {
    const where = this.where('1 = 1', []);
    return this.db.select<{ id: number; global_id: string }>(
      `SELECT id, global_id FROM ${this.tableName} WHERE ${where.clause} ORDER BY id ASC`,
      where.params
    );
  }

  private async executeUpdate(
    assignments: string[],
    params: SqlValue[],
    keyColumn: string,
    keyValue: number
  ): Promise<number> {
    const sets = [...assignments];
    const values = [...params];

    if (this.scope) {
      values.push(this.scope.changeStamp);
      sets.push(`synced_at = $${values.length}`);
    }

    values.push(keyValue);
    const where = this.where(`${keyColumn} = $${values.length}`, values);

    const result = await this.db.execute(
      `UPDATE ${this.tableName} SET ${sets.join(', ')} WHERE ${where.clause}`,
      where.params
    );
    return result.rowsAffected;
  }

  /**
   * Append the owner condition when scoped.
   */
  private where(clause: string, params: SqlValue[]): { clause: string; params: SqlValue[] } {
    if (!this.scope) {
      return { clause, params };
    }
    const scopedParams = [...params, this.scope.ownerId];
    return { clause: `(${clause}) AND user_id = $${scopedParams.length}`, params: scopedParams };
  }
}

/**
 * One data source per syncable table, sharing a database and scope.
 */
export function createEntityTables(db: Database, scope: OwnerScope | null = null): EntityTables {
  return {
    category: new SqliteDataSource(db, ENTITY_DEFINITIONS.category, scope),
    savingsGoal: new SqliteDataSource(db, ENTITY_DEFINITIONS.savingsGoal, scope),
    settings: new SqliteDataSource(db, ENTITY_DEFINITIONS.settings, scope),
    transaction: new SqliteDataSource(db, ENTITY_DEFINITIONS.transaction, scope),
    budget: new SqliteDataSource(db, ENTITY_DEFINITIONS.budget, scope),
    recurringTransaction: new SqliteDataSource(db, ENTITY_DEFINITIONS.recurringTransaction, scope),
    savingsGoalTransaction: new SqliteDataSource(db, ENTITY_DEFINITIONS.savingsGoalTransaction, scope),
  };
}
