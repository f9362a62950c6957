import { describe, expect, it, vi } from 'vitest';
import { loadConfig, validateSupabaseConfig } from './config';

describe('loadConfig', () => {
  it('applies defaults and treats blank values as unset', () => {
    const config = loadConfig({ SYNC_API_URL: '  ', DATABASE_PATH: './data/app.db' });

    expect(config).toEqual({
      SYNC_API_URL: undefined,
      SYNC_INTERVAL_MS: 60000,
      DATABASE_PATH: './data/app.db',
      SERVER_DATABASE_PATH: undefined,
      PORT: 8787,
      SUPABASE_URL: undefined,
      SUPABASE_ANON_KEY: undefined,
      SUPABASE_SERVICE_ROLE_KEY: undefined,
    });
  });

  it('coerces numbers from the environment', () => {
    expect(loadConfig({ SYNC_INTERVAL_MS: '15000', PORT: '0' })).toMatchObject({ SYNC_INTERVAL_MS: 15000, PORT: 0 });
  });

  it('rejects malformed values', () => {
    expect(() => loadConfig({ PORT: '70000' })).toThrow('Invalid configuration: PORT:');
  });
});

describe('validateSupabaseConfig', () => {
  it('treats placeholder credentials as not configured', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    expect(
      validateSupabaseConfig(
        loadConfig({ SUPABASE_URL: 'https://your-project.supabase.co', SUPABASE_ANON_KEY: 'test-anon-key' })
      )
    ).toBe(false);
    expect(
      validateSupabaseConfig(
        loadConfig({ SUPABASE_URL: 'https://example.supabase.co', SUPABASE_ANON_KEY: 'test-anon-key' })
      )
    ).toBe(true);

    warn.mockRestore();
  });
});
