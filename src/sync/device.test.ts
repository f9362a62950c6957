import { describe, expect, it, vi } from 'vitest';
import { saveLocalAuthState } from '@/lib/auth';
import type { Category } from '@/lib/types';
import { loadConfig } from '@/lib/config';
import { createTestServer, ManualClock, openTestDatabase, TEST_BASE_URL } from '@/testing/fixtures';
import { createDeviceSync } from './device';

describe('createDeviceSync', () => {
  it('requires a sync endpoint', async () => {
    await expect(createDeviceSync({ config: loadConfig({}) })).rejects.toThrow('SYNC_API_URL is not configured');
  });

  it('wires repositories to a working sync agent and refreshes subscribers after a sync', async () => {
    const server = await createTestServer(new ManualClock('2026-01-10T00:00:00.000Z'));
    const db = await openTestDatabase();
    await saveLocalAuthState(db, {
      userId: 'alice',
      email: 'alice@example.com',
      accessToken: 'token-alice',
      refreshToken: 'test-refresh-token',
      expiresAt: '2099-01-01T00:00:00.000Z',
    });

    const { repositories, service } = await createDeviceSync({
      config: loadConfig({ SYNC_API_URL: TEST_BASE_URL }),
      db,
      clock: new ManualClock('2026-01-01T00:00:00.000Z'),
      fetchImpl: server.fetch,
      refresher: async () => null,
    });
    await repositories.categories.ensureDefaults();

    const listener = vi.fn<(data: Category[]) => void>();
    repositories.categories.subscribe(listener);
    await vi.waitFor(() => expect(listener).toHaveBeenCalledTimes(1));

    const result = await service.sync();

    expect(result).toMatchObject({ outcome: 'completed', pushed: 10 });
    await vi.waitFor(() => expect(listener).toHaveBeenCalledTimes(2));
    expect(service.isPeriodicSyncRunning).toBe(false);
  });
});
