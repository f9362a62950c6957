import type { SupabaseClient } from '@supabase/supabase-js';

/**
 * Resolves a bearer token to the id of the user who owns it, or null when the
 * token is not accepted.
 */
export interface TokenVerifier {
  verify(token: string): Promise<string | null>;
}

export function createSupabaseTokenVerifier(client: SupabaseClient): TokenVerifier {
  return {
    async verify(token) {
      const { data, error } = await client.auth.getUser(token);
      if (error || !data.user) {
        console.warn('[SyncServer] JWT verification failed:', error?.message ?? 'no user');
        return null;
      }
      return data.user.id;
    },
  };
}

/**
 * Pull the token out of an `Authorization: Bearer <token>` header.
 */
export function extractBearerToken(header: string | null): string | null {
  if (!header) return null;
  const match = /^Bearer\s+(.+)$/i.exec(header.trim());
  return match ? match[1].trim() : null;
}
