import { loadConfig } from '@/lib/config';
import { openDatabase } from '@/lib/database';
import { createServerSupabase } from '@/lib/supabase';
import { createSupabaseTokenVerifier } from './auth';
import { createSyncHandler } from './handler';
import { startSyncServer } from './http';
import { SyncProcessor } from './SyncProcessor';

async function main(): Promise<void> {
  const config = loadConfig();

  const supabase = createServerSupabase(config);
  if (!supabase) {
    throw new Error('Missing Supabase configuration');
  }

  const db = await openDatabase(config.SERVER_DATABASE_PATH ?? null);
  const handler = createSyncHandler({
    processor: new SyncProcessor(db),
    verifier: createSupabaseTokenVerifier(supabase),
  });

  const server = await startSyncServer(handler, config.PORT);
  console.log(`[SyncServer] Listening on port ${config.PORT}`);

  const shutdown = () => {
    console.log('[SyncServer] Shutting down');
    server.close();
    db.close().catch(console.error);
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch(error => {
  console.error('[SyncServer] Failed to start:', error);
  process.exitCode = 1;
});
