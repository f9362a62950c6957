/**
 * Device wiring: one local database, its repositories and the sync agent.
 */

import {
  AuthStateWatermarkStore,
  createSupabaseRefresher,
  LocalSessionCredentials,
  type SessionRefresher,
} from '@/lib/auth';
import { systemClock, type Clock } from '@/lib/clock';
import { loadConfig, type AppConfig } from '@/lib/config';
import { getDatabase, type Database } from '@/lib/database';
import { getSupabase } from '@/lib/supabase';
import { HttpSyncTransport, type FetchLike } from './datasources/HttpSyncTransport';
import { LocalChangeLedger } from './datasources/LocalChangeLedger';
import { createRepositories, refreshRepositories, type Repositories } from './repositories';
import { SyncService } from './services/SyncService';

export interface DeviceSyncOptions {
  config?: AppConfig;
  // Defaults to the shared database at DATABASE_PATH
  db?: Database;
  clock?: Clock;
  fetchImpl?: FetchLike;
  refresher?: SessionRefresher;
}

export interface DeviceSync {
  db: Database;
  repositories: Repositories;
  service: SyncService;
}

export async function createDeviceSync(options: DeviceSyncOptions = {}): Promise<DeviceSync> {
  const config = options.config ?? loadConfig();
  if (!config.SYNC_API_URL) {
    throw new Error('SYNC_API_URL is not configured');
  }

  const clock = options.clock ?? systemClock;
  const db = options.db ?? (await getDatabase(config.DATABASE_PATH ?? null));
  const repositories = createRepositories(db, clock);

  const service = new SyncService({
    store: new LocalChangeLedger(db, clock),
    transport: new HttpSyncTransport({ baseUrl: config.SYNC_API_URL, fetchImpl: options.fetchImpl }),
    credentials: new LocalSessionCredentials(
      db,
      options.refresher ?? createSupabaseRefresher(getSupabase(config)),
      clock
    ),
    watermarks: new AuthStateWatermarkStore(db),
    intervalMs: config.SYNC_INTERVAL_MS,
  });

  // Pulled rows should reach subscribers
  service.onStatusChange((status, error) => {
    if (status === 'idle' && !error) {
      refreshRepositories(repositories).catch(console.error);
    }
  });

  return { db, repositories, service };
}
