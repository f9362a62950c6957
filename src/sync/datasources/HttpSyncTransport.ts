/**
 * HttpSyncTransport
 *
 * POSTs the sync request to the server and validates the reply. Every way the call
 * can fail surfaces as a SyncTransportError.
 */

import { SYNC_CONFIG } from '../types';
import { describeIssues, syncResponseSchema, type SyncRequest, type SyncResponse } from '../wire';
import type { SyncTransport } from './types';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export class SyncTransportError extends Error {
  constructor(
    message: string,
    readonly status?: number
  ) {
    super(message);
    this.name = 'SyncTransportError';
  }
}

export interface HttpSyncTransportOptions {
  baseUrl: string;
  fetchImpl?: FetchLike;
  timeoutMs?: number;
}

export class HttpSyncTransport implements SyncTransport {
  private readonly endpoint: string;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;

  constructor(options: HttpSyncTransportOptions) {
    this.endpoint = new URL(SYNC_CONFIG.SYNC_PATH, options.baseUrl).toString();
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.timeoutMs = options.timeoutMs ?? 30000;
  }

  async sync(request: SyncRequest, credential: string): Promise<SyncResponse> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.endpoint, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${credential}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(request),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new SyncTransportError(`Sync request failed: ${message}`);
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => '');
      throw new SyncTransportError(
        `Sync request rejected with status ${response.status}${detail ? `: ${detail}` : ''}`,
        response.status
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new SyncTransportError('Sync response is not valid JSON', response.status);
    }

    const parsed = syncResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new SyncTransportError(`Malformed sync response: ${describeIssues(parsed.error)}`, response.status);
    }
    return parsed.data;
  }
}
