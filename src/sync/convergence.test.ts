import { describe, expect, it } from 'vitest';
import { createTestDevice, createTestServer, ManualClock, type TestDevice } from '@/testing/fixtures';

function required<T>(value: T | null | undefined, what: string): T {
  if (value === null || value === undefined) {
    throw new Error(`Expected ${what}`);
  }
  return value;
}

async function activeCategoryIds(device: TestDevice): Promise<string[]> {
  const categories = await device.repositories.categories.getAll();
  return categories.map(c => c.global_id).sort();
}

async function syncAll(...devices: TestDevice[]): Promise<void> {
  for (const device of devices) {
    const result = await device.service.sync();
    expect(result.outcome).toBe('completed');
  }
}

describe('two devices syncing through one server', () => {
  it('collapses "Rent" and " rent " into the later one and repoints transactions', async () => {
    const server = await createTestServer(new ManualClock('2026-01-10T00:00:00.000Z'));
    const a = await createTestDevice(server, 'alice', new ManualClock('2026-01-01T00:00:00.000Z'));
    const b = await createTestDevice(server, 'alice', new ManualClock('2026-01-02T00:00:00.000Z'));

    const rentA = await a.repositories.categories.create({
      name: 'Rent',
      icon: '🏠',
      color: '#EF4444',
      default_budget: 1500,
      type: 'fixed',
    });
    const txA = await a.repositories.transactions.create({
      description: 'January rent',
      amount: 1500,
      date: '2026-01-01',
      category_id: rentA.id,
      type: 'expense',
    });
    const rentB = await b.repositories.categories.create({
      name: ' rent ',
      icon: '🏠',
      color: '#EF4444',
      default_budget: 1500,
      type: 'fixed',
    });
    const txB = await b.repositories.transactions.create({
      description: 'February rent',
      amount: 1500,
      date: '2026-02-01',
      category_id: rentB.id,
      type: 'expense',
    });

    await syncAll(a, b, a);

    expect(await activeCategoryIds(a)).toEqual([rentB.global_id]);
    expect(await activeCategoryIds(b)).toEqual([rentB.global_id]);

    const rentOnA = required(await a.repositories.categories.getByName('rent'), 'rent on device A');
    const transactionsOnA = await a.repositories.transactions.getByCategory(rentOnA.id);
    expect(transactionsOnA.map(t => t.global_id).sort()).toEqual([txA.global_id, txB.global_id].sort());

    const transactionsOnB = await b.repositories.transactions.getByCategory(rentB.id);
    expect(transactionsOnB.map(t => t.global_id).sort()).toEqual([txA.global_id, txB.global_id].sort());
  });

  it('converges independently seeded default categories', async () => {
    const server = await createTestServer(new ManualClock('2026-01-10T00:00:00.000Z'));
    const a = await createTestDevice(server, 'alice', new ManualClock('2026-01-01T00:00:00.000Z'));
    const b = await createTestDevice(server, 'alice', new ManualClock('2026-01-02T00:00:00.000Z'));

    expect(await a.repositories.categories.ensureDefaults()).toBe(10);
    expect(await b.repositories.categories.ensureDefaults()).toBe(10);
    const seededOnB = await activeCategoryIds(b);

    await syncAll(a, b, a);

    expect(await activeCategoryIds(a)).toEqual(seededOnB);
    expect(await activeCategoryIds(b)).toEqual(seededOnB);
    // Seeding again after sync adds nothing
    expect(await a.repositories.categories.ensureDefaults()).toBe(0);
  });

  it('keeps the later of two concurrent edits on both devices', async () => {
    const server = await createTestServer(new ManualClock('2026-01-10T00:00:00.000Z'));
    const a = await createTestDevice(server, 'alice', new ManualClock('2026-01-01T00:00:00.000Z'));
    const b = await createTestDevice(server, 'alice', new ManualClock('2026-01-01T00:00:00.000Z'));

    const travel = await a.repositories.categories.create({
      name: 'Travel',
      icon: '✈️',
      color: '#06B6D4',
      default_budget: 200,
      type: 'discretionary',
    });
    await syncAll(a, b);

    const travelOnB = required(await b.repositories.categories.getByName('Travel'), 'travel on device B');
    a.clock.set('2026-01-11T00:00:00.000Z');
    await a.repositories.categories.update(travel.id, { name: 'Trips' });
    b.clock.set('2026-01-12T00:00:00.000Z');
    await b.repositories.categories.update(travelOnB.id, { name: 'Journeys' });

    await syncAll(a, b, a);

    expect((await a.repositories.categories.getById(travel.id))?.name).toBe('Journeys');
    expect((await b.repositories.categories.getById(travelOnB.id))?.name).toBe('Journeys');
  });

  it('takes the later record whole instead of merging fields', async () => {
    const server = await createTestServer(new ManualClock('2026-01-10T00:00:00.000Z'));
    const a = await createTestDevice(server, 'alice', new ManualClock('2026-01-01T00:00:00.000Z'));
    const b = await createTestDevice(server, 'alice', new ManualClock('2026-01-01T00:00:00.000Z'));

    const lunch = await a.repositories.transactions.create({
      description: 'Lunch',
      amount: 10,
      date: '2026-01-01',
      category_id: null,
      type: 'expense',
    });
    await syncAll(a, b);

    const [lunchOnB] = await b.repositories.transactions.getAll();
    a.clock.set('2026-01-11T00:00:00.000Z');
    await a.repositories.transactions.update(lunch.id, { amount: 25 });
    b.clock.set('2026-01-12T00:00:00.000Z');
    await b.repositories.transactions.update(lunchOnB.id, { description: 'Dinner' });

    await syncAll(a, b, a);

    expect(await a.repositories.transactions.getById(lunch.id)).toMatchObject({ amount: 10, description: 'Dinner' });
    expect(await b.repositories.transactions.getById(lunchOnB.id)).toMatchObject({
      amount: 10,
      description: 'Dinner',
    });
  });

  it('hands the fallback category back to the device that sent an uncategorized row', async () => {
    const server = await createTestServer(new ManualClock('2026-01-10T00:00:00.000Z'));
    const a = await createTestDevice(server, 'alice', new ManualClock('2026-01-01T00:00:00.000Z'));

    const coffee = await a.repositories.transactions.create({
      description: 'Coffee',
      amount: 3,
      date: '2026-01-01',
      category_id: null,
      type: 'expense',
    });
    await syncAll(a);

    const uncategorized = required(await a.repositories.categories.getByName('Uncategorized'), 'fallback category');
    expect(await a.repositories.transactions.getById(coffee.id)).toMatchObject({
      category_id: uncategorized.id,
      updated_at: '2026-01-10T00:00:00.000Z',
    });
  });

  it('propagates deletions', async () => {
    const server = await createTestServer(new ManualClock('2026-01-10T00:00:00.000Z'));
    const a = await createTestDevice(server, 'alice', new ManualClock('2026-01-01T00:00:00.000Z'));
    const b = await createTestDevice(server, 'alice', new ManualClock('2026-01-01T00:00:00.000Z'));

    const food = await a.repositories.categories.create({
      name: 'Food',
      icon: '🍽️',
      color: '#F59E0B',
      default_budget: 500,
      type: 'discretionary',
    });
    const lunch = await a.repositories.transactions.create({
      description: 'Lunch',
      amount: 12,
      date: '2026-01-01',
      category_id: food.id,
      type: 'expense',
    });
    await syncAll(a, b);
    expect(await b.repositories.transactions.count()).toBe(1);

    a.clock.set('2026-01-11T00:00:00.000Z');
    expect(await a.repositories.transactions.delete(lunch.id)).toBe(true);
    await syncAll(a, b);

    expect(await b.repositories.transactions.count()).toBe(0);
    expect(await b.repositories.categories.count()).toBe(1);
  });

  it('does not leak rows between users', async () => {
    const server = await createTestServer(new ManualClock('2026-01-10T00:00:00.000Z'));
    const alice = await createTestDevice(server, 'alice');
    const bob = await createTestDevice(server, 'bob');

    await alice.repositories.settings.setMonthlyIncome(4000);
    await syncAll(alice, bob);

    expect(await bob.repositories.settings.get()).toBeNull();
  });
});
