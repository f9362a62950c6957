/**
 * Fetch-style handler for POST /api/sync.
 */

import { SYNC_CONFIG } from '@/sync/types';
import { describeIssues, syncRequestSchema } from '@/sync/wire';
import { extractBearerToken, type TokenVerifier } from './auth';
import type { SyncProcessor } from './SyncProcessor';

const corsHeaders = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers': 'authorization, x-client-info, apikey, content-type',
};

export interface SyncHandlerOptions {
  processor: SyncProcessor;
  verifier: TokenVerifier;
}

export type SyncHandler = (req: Request) => Promise<Response>;

function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { ...corsHeaders, 'Content-Type': 'application/json' },
  });
}

function errorResponse(status: number, error: string): Response {
  return jsonResponse({ success: false, error }, status);
}

export function createSyncHandler({ processor, verifier }: SyncHandlerOptions): SyncHandler {
  return async req => {
    if (new URL(req.url).pathname !== SYNC_CONFIG.SYNC_PATH) {
      return errorResponse(404, 'Not found');
    }

    // CORS preflight
    if (req.method === 'OPTIONS') {
      return new Response('ok', { headers: corsHeaders });
    }

    if (req.method !== 'POST') {
      return errorResponse(405, 'Method not allowed');
    }

    try {
      const token = extractBearerToken(req.headers.get('authorization'));
      if (!token) {
        return errorResponse(401, 'Missing bearer token');
      }

      const ownerId = await verifier.verify(token);
      if (!ownerId) {
        return errorResponse(401, 'Invalid or expired token');
      }

      let body: unknown;
      try {
        body = await req.json();
      } catch {
        return errorResponse(400, 'Request body is not valid JSON');
      }

      const parsed = syncRequestSchema.safeParse(body);
      if (!parsed.success) {
        return errorResponse(400, `Invalid sync request: ${describeIssues(parsed.error)}`);
      }

      const response = await processor.process(ownerId, parsed.data);
      return jsonResponse(response);
    } catch (error) {
      console.error('[SyncServer] Sync request failed:', error);
      return errorResponse(500, 'Internal server error');
    }
  };
}
