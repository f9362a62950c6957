import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ManualClock, openTestDatabase } from '@/testing/fixtures';
import { LocalChangeLedger } from '../datasources/LocalChangeLedger';
import type { CredentialProvider, SyncTransport, WatermarkStore } from '../datasources/types';
import type { SyncStatusState } from '../types';
import { emptyPayload, type SyncRequest, type SyncResponse } from '../wire';
import { SyncService } from './SyncService';

const SYNCED_AT = '2026-03-01T00:00:00.000Z';
const RENT = '2a2a2a2a-0000-4000-8000-000000000001';
const FOOD = '2b2b2b2b-0000-4000-8000-000000000002';

class MemoryWatermarks implements WatermarkStore {
  saved: string[] = [];
  constructor(private value: string | null = null) {}

  async load(): Promise<string | null> {
    return this.value;
  }

  async save(watermark: string): Promise<void> {
    this.value = watermark;
    this.saved.push(watermark);
  }
}

function credentials(token: string | null): CredentialProvider & { calls: number } {
  return {
    calls: 0,
    async getValidCredential() {
      this.calls++;
      return token;
    },
  };
}

function respondWith(response: Partial<SyncResponse> = {}) {
  return vi.fn(async (_request: SyncRequest, _credential: string): Promise<SyncResponse> => ({
    serverChanges: emptyPayload(),
    syncedAt: SYNCED_AT,
    ...response,
  }));
}

describe('SyncService', () => {
  let store: LocalChangeLedger;

  beforeEach(async () => {
    store = new LocalChangeLedger(await openTestDatabase(), new ManualClock('2026-02-01T00:00:00.000Z'));
    await store.table('category').insert({
      global_id: RENT,
      name: 'Rent',
      icon: '',
      color: '',
      default_budget: 0,
      type: 'fixed',
      updated_at: '2026-01-01T00:00:00.000Z',
      is_deleted: 0,
    });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('exchanges local changes and stores the new watermark', async () => {
    const sync = respondWith({
      serverChanges: {
        ...emptyPayload(),
        categories: [
          {
            globalId: FOOD,
            name: 'Food',
            icon: '',
            color: '',
            defaultBudget: 0,
            type: 'discretionary',
            updatedAt: '2026-02-15T00:00:00.000Z',
            isDeleted: false,
          },
        ],
      },
    });
    const watermarks = new MemoryWatermarks();
    const service = new SyncService({ store, transport: { sync }, credentials: credentials('test-token'), watermarks });
    const statuses: SyncStatusState[] = [];
    service.onStatusChange(status => statuses.push(status));

    const result = await service.sync();

    expect(result).toEqual({ outcome: 'completed', pushed: 1, pulled: 1, errors: [] });
    expect(sync).toHaveBeenCalledTimes(1);
    const [request, token] = sync.mock.calls[0];
    expect(token).toBe('test-token');
    expect(request.lastSyncedAt).toBeNull();
    expect(request.clientChanges.categories.map(c => c.globalId)).toEqual([RENT]);
    expect(watermarks.saved).toEqual([SYNCED_AT]);
    expect(service.lastSyncAt).toBe(SYNCED_AT);
    expect(statuses).toEqual(['running', 'idle']);
    expect((await store.table('category').findByGlobalId(FOOD))?.name).toBe('Food');
  });

  it('sends the stored watermark and never moves it backwards', async () => {
    const sync = respondWith({ syncedAt: '2026-01-01T00:00:00.000Z' });
    const watermarks = new MemoryWatermarks('2026-01-15T00:00:00.000Z');
    const service = new SyncService({ store, transport: { sync }, credentials: credentials('test-token'), watermarks });

    await service.sync();

    expect(sync.mock.calls[0][0].lastSyncedAt).toBe('2026-01-15T00:00:00.000Z');
    expect(sync.mock.calls[0][0].clientChanges.categories).toEqual([]);
    expect(watermarks.saved).toEqual(['2026-01-15T00:00:00.000Z']);
  });

  it('reports unauthenticated and disables itself without calling the server', async () => {
    const sync = respondWith();
    const service = new SyncService({
      store,
      transport: { sync },
      credentials: credentials(null),
      watermarks: new MemoryWatermarks(),
    });

    const result = await service.sync();

    expect(result.outcome).toBe('unauthenticated');
    expect(service.status).toBe('disabled');
    expect(sync).not.toHaveBeenCalled();
  });

  it('skips a sync requested while another is running', async () => {
    let finish: (response: SyncResponse) => void = () => {};
    const transport: SyncTransport = {
      sync: vi.fn(
        () =>
          new Promise<SyncResponse>(resolve => {
            finish = resolve;
          })
      ),
    };
    const service = new SyncService({
      store,
      transport,
      credentials: credentials('test-token'),
      watermarks: new MemoryWatermarks(),
    });

    const first = service.sync();
    const second = await service.sync();
    expect(second).toEqual({ outcome: 'busy', pushed: 0, pulled: 0, errors: [] });
    expect(service.isSyncing).toBe(true);

    await vi.waitFor(() => expect(transport.sync).toHaveBeenCalledTimes(1));
    finish({ serverChanges: emptyPayload(), syncedAt: SYNCED_AT });

    expect((await first).outcome).toBe('completed');
    expect(service.isSyncing).toBe(false);
    expect(transport.sync).toHaveBeenCalledTimes(1);
  });

  it('keeps the watermark and local rows when the exchange fails', async () => {
    const categories = store.table('category');
    await categories.insert({
      global_id: FOOD,
      name: ' rent ',
      icon: '',
      color: '',
      default_budget: 0,
      type: 'fixed',
      updated_at: '2026-01-02T00:00:00.000Z',
      is_deleted: 0,
    });
    const watermarks = new MemoryWatermarks('2026-01-01T00:00:00.000Z');
    const service = new SyncService({
      store,
      transport: { sync: vi.fn(async () => Promise.reject(new Error('Sync request failed: offline'))) },
      credentials: credentials('test-token'),
      watermarks,
    });
    const errors: (string | undefined)[] = [];
    service.onStatusChange((_status, error) => errors.push(error));

    const result = await service.sync();

    expect(result).toEqual({ outcome: 'failed', pushed: 0, pulled: 0, errors: ['Sync request failed: offline'] });
    expect(watermarks.saved).toEqual([]);
    expect(service.lastError).toBe('Sync request failed: offline');
    expect(service.status).toBe('idle');
    expect(errors).toEqual([undefined, 'Sync request failed: offline']);
    // No normalization happened
    expect(await categories.count()).toBe(2);
  });

  it('keeps notifying when a status listener throws', async () => {
    const service = new SyncService({
      store,
      transport: { sync: respondWith() },
      credentials: credentials('test-token'),
      watermarks: new MemoryWatermarks(),
    });
    const seen: SyncStatusState[] = [];
    service.onStatusChange(() => {
      throw new Error('listener failure');
    });
    const unsubscribe = service.onStatusChange(status => seen.push(status));

    await service.sync();
    unsubscribe();
    await service.sync();

    expect(seen).toEqual(['running', 'idle']);
  });

  describe('periodic sync', () => {
    it('waits one interval before the first tick', async () => {
      vi.useFakeTimers();
      const provider = credentials(null);
      const service = new SyncService({
        store,
        transport: { sync: respondWith() },
        credentials: provider,
        watermarks: new MemoryWatermarks(),
        intervalMs: 1000,
      });

      await service.initialize();
      expect(service.isPeriodicSyncRunning).toBe(true);
      expect(provider.calls).toBe(0);

      await vi.advanceTimersByTimeAsync(999);
      expect(provider.calls).toBe(0);

      await vi.advanceTimersByTimeAsync(1);
      expect(provider.calls).toBe(1);

      await vi.advanceTimersByTimeAsync(2000);
      expect(provider.calls).toBe(3);

      service.destroy();
      await vi.advanceTimersByTimeAsync(5000);
      expect(provider.calls).toBe(3);
    });

    it('starts once and stops idempotently', () => {
      vi.useFakeTimers();
      const service = new SyncService({
        store,
        transport: { sync: respondWith() },
        credentials: credentials(null),
        watermarks: new MemoryWatermarks(),
      });

      service.startPeriodicSync(1000);
      service.startPeriodicSync(1000);
      expect(vi.getTimerCount()).toBe(1);

      service.stopPeriodicSync();
      service.stopPeriodicSync();
      expect(service.isPeriodicSyncRunning).toBe(false);
      expect(vi.getTimerCount()).toBe(0);
    });
  });
});
