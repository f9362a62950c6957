import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { convertParams, openDatabase, SqliteDatabase } from './database';

describe('convertParams', () => {
  it('rewrites numbered placeholders in order of appearance', () => {
    const result = convertParams('SELECT * FROM t WHERE a = $2 AND b = $1 OR c = $2', ['x', 'y']);

    expect(result.query).toBe('SELECT * FROM t WHERE a = ? AND b = ? OR c = ?');
    expect(result.params).toEqual(['y', 'x', 'y']);
  });

  it('leaves queries without placeholders alone', () => {
    expect(convertParams('SELECT 1', [])).toEqual({ query: 'SELECT 1', params: [] });
  });

  it('throws when a placeholder has no value', () => {
    expect(() => convertParams('SELECT * FROM t WHERE a = $3', [1])).toThrow('Missing value for parameter $3');
  });
});

describe('SqliteDatabase', () => {
  let directory: string | null = null;

  afterEach(async () => {
    if (directory) {
      await rm(directory, { recursive: true, force: true });
      directory = null;
    }
  });

  it('executes statements and selects rows as objects', async () => {
    const db = await SqliteDatabase.open(null);
    await db.execute('CREATE TABLE notes (id INTEGER PRIMARY KEY AUTOINCREMENT, body TEXT)');

    const first = await db.execute('INSERT INTO notes (body) VALUES ($1)', ['hello']);
    const second = await db.execute('INSERT INTO notes (body) VALUES ($1)', ['world']);
    const updated = await db.execute('UPDATE notes SET body = $1 WHERE id > $2', ['x', 0]);

    expect(first).toEqual({ rowsAffected: 1, lastInsertId: 1 });
    expect(second.lastInsertId).toBe(2);
    expect(updated.rowsAffected).toBe(2);
    expect(await db.select('SELECT id, body FROM notes ORDER BY id')).toEqual([
      { id: 1, body: 'x' },
      { id: 2, body: 'x' },
    ]);
    await db.close();
  });

  it('returns an empty array when nothing matches', async () => {
    const db = await openDatabase(null);
    expect(await db.select('SELECT id FROM categories')).toEqual([]);
    await db.close();
  });

  it('persists to disk and reopens without reapplying migrations', async () => {
    directory = await mkdtemp(join(tmpdir(), 'budget-sync-'));
    const filePath = join(directory, 'app.db');

    const db = await openDatabase(filePath);
    await db.execute(
      `INSERT INTO categories (global_id, name, type, updated_at) VALUES ($1, $2, $3, $4)`,
      ['8b3f6a2e-0c1d-4e5f-9a7b-1c2d3e4f5a6b', 'Rent', 'fixed', '2026-01-01T00:00:00.000Z']
    );
    await db.close();

    const reopened = await openDatabase(filePath);
    expect(await reopened.select('SELECT name FROM categories')).toEqual([{ name: 'Rent' }]);
    expect(await reopened.select('SELECT name FROM _migrations')).toEqual([{ name: '00001_initial_schema' }]);
    await reopened.close();
  });
});
