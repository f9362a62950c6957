/**
 * SyncProcessor
 *
 * Server counterpart of the device SyncService. For one owner it applies the client's
 * changes, normalizes, and returns every row the client has not seen yet together
 * with a new watermark.
 *
 * Rows are stamped with the issuing request's watermark when written, and changes are
 * collected by that stamp rather than by the client-supplied UpdatedAt, so rows pushed
 * late by one device still reach devices that synced in between.
 */

import { systemClock, type Clock } from '@/lib/clock';
import type { Database } from '@/lib/database';
import { ChangeApplier } from '@/sync/services/ChangeApplier';
import { ChangeCollector } from '@/sync/services/ChangeCollector';
import { DuplicateNormalizer } from '@/sync/services/DuplicateNormalizer';
import { strictlyAfter } from '@/sync/services/conflict';
import type { SyncRequest, SyncResponse } from '@/sync/wire';
import { countPayload } from '@/sync/wire';
import { ServerSyncScope } from './ServerSyncScope';

const LOG_PREFIX = '[SyncProcessor]';

export class SyncProcessor {
  private readonly ownerQueues = new Map<string, Promise<void>>();
  private lastIssued: string | null = null;

  constructor(
    private readonly db: Database,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Process one sync request. Requests for the same owner run one at a time.
   */
  process(ownerId: string, request: SyncRequest): Promise<SyncResponse> {
    return this.runExclusive(ownerId, () => this.processInner(ownerId, request));
  }

  private async processInner(ownerId: string, request: SyncRequest): Promise<SyncResponse> {
    const syncedAt = this.issueWatermark();
    const scope = new ServerSyncScope(this.db, ownerId, syncedAt, this.clock);
    const normalizer = new DuplicateNormalizer(scope, LOG_PREFIX);

    // Clean up leftovers before matching incoming rows against stored ones
    await normalizer.normalize();

    const applier = new ChangeApplier(scope, LOG_PREFIX, { restampFallbacks: true });
    const stats = await applier.apply(request.clientChanges);
    const normalized = await normalizer.normalize();
    const serverChanges = await new ChangeCollector(scope).collect(request.lastSyncedAt);

    console.info(
      `${LOG_PREFIX} owner=${ownerId} received=${countPayload(request.clientChanges)} ` +
        `inserted=${stats.inserted} updated=${stats.updated} skipped=${stats.skipped} ` +
        `fallbacks=${stats.fallbacks} merged=${normalized.exactRemoved + normalized.semanticRemoved} ` +
        `returned=${countPayload(serverChanges)}`
    );

    return { serverChanges, syncedAt };
  }

  /**
   * Server "now", strictly later than any watermark issued before.
   */
  private issueWatermark(): string {
    const now = this.clock.now();
    const watermark = this.lastIssued === null ? now : strictlyAfter(this.lastIssued, now);
    this.lastIssued = watermark;
    return watermark;
  }

  private runExclusive<T>(ownerId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.ownerQueues.get(ownerId) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.ownerQueues.set(ownerId, tail);

    return run.finally(() => {
      if (this.ownerQueues.get(ownerId) === tail) {
        this.ownerQueues.delete(ownerId);
      }
    });
  }
}
