/**
 * Shared helpers for tests: a hand-driven clock, in-memory databases and a device
 * wired to an in-process sync server.
 */

import { addMilliseconds, parseISO } from 'date-fns';
import type { Clock } from '@/lib/clock';
import { openDatabase, type Database } from '@/lib/database';
import { createSyncHandler, type SyncHandler } from '@/server/handler';
import type { TokenVerifier } from '@/server/auth';
import { SyncProcessor } from '@/server/SyncProcessor';
import { AuthStateWatermarkStore, LocalSessionCredentials, saveLocalAuthState } from '@/lib/auth';
import { HttpSyncTransport, type FetchLike } from '@/sync/datasources/HttpSyncTransport';
import { LocalChangeLedger } from '@/sync/datasources/LocalChangeLedger';
import { createRepositories, type Repositories } from '@/sync/repositories';
import { SyncService } from '@/sync/services/SyncService';

export const TEST_BASE_URL = 'http://sync.test';

export class ManualClock implements Clock {
  constructor(private current: string = '2026-01-01T00:00:00.000Z') {}

  now(): string {
    return this.current;
  }

  set(timestamp: string): void {
    this.current = timestamp;
  }

  advance(ms: number): string {
    this.current = addMilliseconds(parseISO(this.current), ms).toISOString();
    return this.current;
  }
}

export function openTestDatabase(): Promise<Database> {
  return openDatabase(null);
}

/**
 * Accepts tokens of the form "token-<userId>".
 */
export const prefixTokenVerifier: TokenVerifier = {
  async verify(token) {
    return token.startsWith('token-') ? token.slice('token-'.length) : null;
  },
};

/**
 * Route fetch calls straight into a handler.
 */
export function handlerFetch(handler: SyncHandler): FetchLike {
  return (input, init) => handler(new Request(input, init));
}

export interface TestServer {
  db: Database;
  clock: ManualClock;
  processor: SyncProcessor;
  handler: SyncHandler;
  fetch: FetchLike;
}

export async function createTestServer(clock: ManualClock = new ManualClock()): Promise<TestServer> {
  const db = await openTestDatabase();
  const processor = new SyncProcessor(db, clock);
  const handler = createSyncHandler({ processor, verifier: prefixTokenVerifier });
  return { db, clock, processor, handler, fetch: handlerFetch(handler) };
}

export interface TestDevice {
  db: Database;
  clock: ManualClock;
  repositories: Repositories;
  service: SyncService;
}

/**
 * A signed-in device talking to the given server. The session never expires within a test.
 */
export async function createTestDevice(
  server: TestServer,
  userId: string,
  clock: ManualClock = new ManualClock()
): Promise<TestDevice> {
  const db = await openTestDatabase();
  await saveLocalAuthState(db, {
    userId,
    email: `${userId}@example.com`,
    accessToken: `token-${userId}`,
    refreshToken: 'test-refresh-token',
    expiresAt: '2099-01-01T00:00:00.000Z',
  });

  const service = new SyncService({
    store: new LocalChangeLedger(db, clock),
    transport: new HttpSyncTransport({ baseUrl: TEST_BASE_URL, fetchImpl: server.fetch }),
    credentials: new LocalSessionCredentials(db, async () => null, clock),
    watermarks: new AuthStateWatermarkStore(db),
  });

  return { db, clock, repositories: createRepositories(db, clock), service };
}
