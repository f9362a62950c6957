import type { SupabaseClient } from '@supabase/supabase-js';
import type { CredentialProvider, WatermarkStore } from '@/sync/datasources/types';
import { SYNC_CONFIG } from '@/sync/types';
import { systemClock, type Clock } from './clock';
import type { Database } from './database';
import { getSupabase } from './supabase';
import type { AuthSession, LocalAuthState } from './types';

// Exchanges a refresh token for a new session, or null when the refresh is rejected
export type SessionRefresher = (refreshToken: string) => Promise<AuthSession | null>;

/**
 * Get the current auth session from local SQLite storage.
 */
export async function getLocalAuthState(db: Database): Promise<LocalAuthState | null> {
  const result = await db.select<LocalAuthState>(
    'SELECT id, user_id, email, access_token, refresh_token, expires_at, last_sync_at FROM auth_state WHERE id = 1'
  );
  return result[0] ?? null;
}

/**
 * Save auth session to local SQLite storage. Passing null clears it.
 * A different user starts over from a null watermark.
 */
export async function saveLocalAuthState(db: Database, session: AuthSession | null): Promise<void> {
  if (session) {
    await db.execute(
      `INSERT INTO auth_state (id, user_id, email, access_token, refresh_token, expires_at)
       VALUES (1, $1, $2, $3, $4, $5)
       ON CONFLICT(id) DO UPDATE SET
         last_sync_at = CASE WHEN auth_state.user_id = $1 THEN auth_state.last_sync_at ELSE NULL END,
         user_id = $1,
         email = $2,
         access_token = $3,
         refresh_token = $4,
         expires_at = $5`,
      [session.userId, session.email, session.accessToken, session.refreshToken, session.expiresAt]
    );
  } else {
    await db.execute('DELETE FROM auth_state WHERE id = 1');
  }
}

/**
 * Update the last sync timestamp.
 */
export async function updateLastSyncAt(db: Database, timestamp: string): Promise<void> {
  await db.execute('UPDATE auth_state SET last_sync_at = $1 WHERE id = 1', [timestamp]);
}

/**
 * Check if the session token is expired or about to expire.
 */
export function isSessionExpired(expiresAt: string, now: string): boolean {
  const remaining = new Date(expiresAt).getTime() - new Date(now).getTime();
  return remaining < SYNC_CONFIG.TOKEN_REFRESH_MARGIN_MS;
}

/**
 * Refresh the session through Supabase.
 */
export function createSupabaseRefresher(client: SupabaseClient | null = getSupabase()): SessionRefresher {
  return async refreshToken => {
    if (!client) {
      return null;
    }

    try {
      const { data, error } = await client.auth.refreshSession({ refresh_token: refreshToken });

      if (error || !data.session || !data.user) {
        console.error('Failed to refresh session:', error);
        return null;
      }

      const expiresAt = data.session.expires_at;
      return {
        userId: data.user.id,
        email: data.user.email ?? '',
        accessToken: data.session.access_token,
        refreshToken: data.session.refresh_token,
        expiresAt: expiresAt !== undefined
          ? new Date(expiresAt * 1000).toISOString()
          : new Date(Date.now() + data.session.expires_in * 1000).toISOString(),
      };
    } catch (error) {
      console.error('Failed to refresh session:', error);
      return null;
    }
  };
}

/**
 * Credential provider over the auth_state row. Tokens close to expiry are refreshed and
 * the refreshed session is written back.
 */
export class LocalSessionCredentials implements CredentialProvider {
  constructor(
    private readonly db: Database,
    private readonly refresh: SessionRefresher = createSupabaseRefresher(),
    private readonly clock: Clock = systemClock
  ) {}

  async getValidCredential(): Promise<string | null> {
    const localAuth = await getLocalAuthState(this.db);

    if (!localAuth?.access_token || !localAuth.expires_at) {
      return null;
    }

    if (!isSessionExpired(localAuth.expires_at, this.clock.now())) {
      return localAuth.access_token;
    }

    if (!localAuth.refresh_token) {
      return null;
    }

    const refreshed = await this.refresh(localAuth.refresh_token);
    if (!refreshed) {
      return null;
    }

    await saveLocalAuthState(this.db, refreshed);
    return refreshed.accessToken;
  }
}

/**
 * Watermark kept in auth_state.last_sync_at.
 */
export class AuthStateWatermarkStore implements WatermarkStore {
  constructor(private readonly db: Database) {}

  async load(): Promise<string | null> {
    const localAuth = await getLocalAuthState(this.db);
    return localAuth?.last_sync_at ?? null;
  }

  async save(watermark: string): Promise<void> {
    await updateLastSyncAt(this.db, watermark);
  }
}
