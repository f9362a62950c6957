import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { Category } from '@/lib/types';
import { ManualClock, openTestDatabase } from '@/testing/fixtures';
import { CategoriesRepository } from './CategoriesRepository';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('BaseRepository', () => {
  let clock: ManualClock;
  let categories: CategoriesRepository;

  beforeEach(async () => {
    clock = new ManualClock('2026-01-01T00:00:00.000Z');
    categories = new CategoriesRepository(await openTestDatabase(), clock);
  });

  it('creates rows with a fresh global id and the current time', async () => {
    const created = await categories.create({
      name: 'Rent',
      icon: '🏠',
      color: '#EF4444',
      default_budget: 1500,
      type: 'fixed',
    });

    expect(created).toMatchObject({
      id: 1,
      name: 'Rent',
      updated_at: '2026-01-01T00:00:00.000Z',
      is_deleted: 0,
    });
    expect(created.global_id).toMatch(UUID_PATTERN);
  });

  it('bumps UpdatedAt on update and keeps the global id', async () => {
    const created = await categories.create({ name: 'Rent', icon: '', color: '', default_budget: 0, type: 'fixed' });
    clock.set('2026-01-05T00:00:00.000Z');

    const updated = await categories.update(created.id, { default_budget: 1200 });

    expect(updated).toMatchObject({
      global_id: created.global_id,
      default_budget: 1200,
      updated_at: '2026-01-05T00:00:00.000Z',
    });
  });

  it('ignores sync columns passed along with the changes', async () => {
    const created = await categories.create({ name: 'Rent', icon: '', color: '', default_budget: 0, type: 'fixed' });
    clock.set('2026-01-05T00:00:00.000Z');
    const changes = {
      name: 'Housing',
      global_id: '11111111-1111-4111-8111-111111111111',
      updated_at: '2030-01-01T00:00:00.000Z',
      is_deleted: 1,
    };

    await categories.update(created.id, changes);

    expect(await categories.getById(created.id)).toMatchObject({
      name: 'Housing',
      global_id: created.global_id,
      updated_at: '2026-01-05T00:00:00.000Z',
      is_deleted: 0,
    });
  });

  it('soft deletes and hides deleted rows', async () => {
    const created = await categories.create({ name: 'Rent', icon: '', color: '', default_budget: 0, type: 'fixed' });
    clock.set('2026-01-05T00:00:00.000Z');

    expect(await categories.delete(created.id)).toBe(true);
    expect(await categories.delete(created.id)).toBe(false);
    expect(await categories.getById(created.id)).toBeNull();
    expect(await categories.update(created.id, { name: 'Housing' })).toBeNull();
    expect(await categories.getAll()).toEqual([]);
  });

  it('emits current data on subscribe and again after every write', async () => {
    const listener = vi.fn<(data: Category[]) => void>();
    const unsubscribe = categories.subscribe(listener);
    await vi.waitFor(() => expect(listener).toHaveBeenCalledTimes(1));
    expect(listener).toHaveBeenLastCalledWith([]);

    await categories.create({ name: 'Rent', icon: '', color: '', default_budget: 0, type: 'fixed' });
    expect(listener).toHaveBeenCalledTimes(2);
    expect(listener.mock.calls[1][0].map(c => c.name)).toEqual(['Rent']);

    unsubscribe();
    await categories.create({ name: 'Food', icon: '', color: '', default_budget: 0, type: 'discretionary' });
    expect(listener).toHaveBeenCalledTimes(2);
  });
});
