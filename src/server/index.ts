export { createSupabaseTokenVerifier, extractBearerToken, type TokenVerifier } from './auth';
export { createSyncHandler, type SyncHandler, type SyncHandlerOptions } from './handler';
export { startSyncServer } from './http';
export { ServerSyncScope } from './ServerSyncScope';
export { SyncProcessor } from './SyncProcessor';
