/**
 * SyncService
 *
 * Device-side orchestrator for one store:
 * - Non-blocking run lock (a second caller is skipped, never queued)
 * - One round trip per sync: collect local changes, exchange, normalize, apply
 * - Watermark loaded once and persisted after every successful round trip
 * - Periodic sync without an initial tick
 */

import { ChangeApplier } from './ChangeApplier';
import { ChangeCollector } from './ChangeCollector';
import { DuplicateNormalizer } from './DuplicateNormalizer';
import { laterOf } from './conflict';
import type { CredentialProvider, SyncStore, SyncTransport, WatermarkStore } from '../datasources/types';
import {
  SYNC_CONFIG,
  type SyncResult,
  type SyncStatusListener,
  type SyncStatusState,
} from '../types';
import { countPayload } from '../wire';

export interface SyncServiceOptions {
  store: SyncStore;
  transport: SyncTransport;
  credentials: CredentialProvider;
  watermarks: WatermarkStore;
  intervalMs?: number;
}

const LOG_PREFIX = '[SyncService]';

export class SyncService {
  private isSyncingInner: boolean = false;
  private lastSyncAtInner: string | null = null;
  private watermarkLoaded: boolean = false;
  private statusInner: SyncStatusState = 'idle';
  private lastErrorInner: string | null = null;

  private periodicSyncInterval: ReturnType<typeof setInterval> | null = null;
  private statusListeners: Set<SyncStatusListener> = new Set();

  private readonly store: SyncStore;
  private readonly transport: SyncTransport;
  private readonly credentials: CredentialProvider;
  private readonly watermarks: WatermarkStore;
  private readonly intervalMs: number;

  constructor(options: SyncServiceOptions) {
    this.store = options.store;
    this.transport = options.transport;
    this.credentials = options.credentials;
    this.watermarks = options.watermarks;
    this.intervalMs = options.intervalMs ?? SYNC_CONFIG.PERIODIC_SYNC_MS;
  }

  /**
   * Load the persisted watermark and start periodic sync.
   * The first sync is left to the caller.
   */
  async initialize(): Promise<void> {
    await this.loadWatermark();
    this.startPeriodicSync();
  }

  /**
   * Stop the timer and drop listeners.
   */
  destroy(): void {
    this.stopPeriodicSync();
    this.statusListeners.clear();
  }

  // ============ Status Getters ============

  get isSyncing(): boolean {
    return this.isSyncingInner;
  }

  get lastSyncAt(): string | null {
    return this.lastSyncAtInner;
  }

  get status(): SyncStatusState {
    return this.statusInner;
  }

  get lastError(): string | null {
    return this.lastErrorInner;
  }

  get isPeriodicSyncRunning(): boolean {
    return this.periodicSyncInterval !== null;
  }

  // ============ Sync ============

  /**
   * Run one sync round trip. Never throws; failures come back in the result.
   */
  async sync(): Promise<SyncResult> {
    // Taken before the first await so concurrent callers see it
    if (this.isSyncingInner) {
      return { outcome: 'busy', pushed: 0, pulled: 0, errors: [] };
    }
    this.isSyncingInner = true;

    try {
      const credential = await this.credentials.getValidCredential();
      if (!credential) {
        this.setStatus('disabled');
        return { outcome: 'unauthenticated', pushed: 0, pulled: 0, errors: [] };
      }

      this.setStatus('running');

      const since = await this.loadWatermark();
      const clientChanges = await new ChangeCollector(this.store).collect(since);
      const response = await this.transport.sync({ lastSyncedAt: since, clientChanges }, credential);

      // Nothing local has changed up to here, so a failed exchange leaves the store as it was
      await new DuplicateNormalizer(this.store).normalize();
      const stats = await new ChangeApplier(this.store, LOG_PREFIX).apply(response.serverChanges);

      const watermark = laterOf(since, response.syncedAt);
      await this.watermarks.save(watermark);
      this.lastSyncAtInner = watermark;

      const pushed = countPayload(clientChanges);
      const pulled = stats.inserted + stats.updated;
      if (pushed > 0 || pulled > 0) {
        console.info(`${LOG_PREFIX} Pushed ${pushed}, applied ${pulled}, skipped ${stats.skipped}`);
      }

      this.lastErrorInner = null;
      this.setStatus('idle');
      return { outcome: 'completed', pushed, pulled, errors: [] };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown sync error';
      console.error(`${LOG_PREFIX} Sync failed:`, error);
      this.lastErrorInner = errorMessage;
      this.setStatus('idle', errorMessage);
      return { outcome: 'failed', pushed: 0, pulled: 0, errors: [errorMessage] };
    } finally {
      this.isSyncingInner = false;
    }
  }

  // ============ Periodic Sync ============

  /**
   * Fire sync every interval. The first tick comes one interval after the call.
   */
  startPeriodicSync(intervalMs: number = this.intervalMs): void {
    if (this.periodicSyncInterval) return;

    this.periodicSyncInterval = setInterval(() => {
      this.sync().catch(console.error);
    }, intervalMs);
  }

  stopPeriodicSync(): void {
    if (this.periodicSyncInterval) {
      clearInterval(this.periodicSyncInterval);
      this.periodicSyncInterval = null;
    }
  }

  // ============ Status Subscriptions ============

  /**
   * Subscribe to sync status changes.
   */
  onStatusChange(listener: SyncStatusListener): () => void {
    this.statusListeners.add(listener);
    return () => this.statusListeners.delete(listener);
  }

  // ============ Private Methods ============

  private async loadWatermark(): Promise<string | null> {
    if (!this.watermarkLoaded) {
      this.lastSyncAtInner = await this.watermarks.load();
      this.watermarkLoaded = true;
    }
    return this.lastSyncAtInner;
  }

  private setStatus(status: SyncStatusState, error?: string): void {
    this.statusInner = status;
    this.notifyStatusListeners(status, error);
  }

  private notifyStatusListeners(status: SyncStatusState, error?: string): void {
    for (const listener of this.statusListeners) {
      try {
        listener(status, error);
      } catch (e) {
        console.error('Error in sync status listener:', e);
      }
    }
  }
}
