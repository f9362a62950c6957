import { z } from 'zod';

const PLACEHOLDER_URL = 'https://your-project.supabase.co';
const PLACEHOLDER_KEY = 'your-anon-key';

const optionalString = z
  .string()
  .trim()
  .transform(value => (value === '' ? undefined : value))
  .optional();

const configSchema = z.object({
  SYNC_API_URL: optionalString,
  SYNC_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
  DATABASE_PATH: optionalString,
  SERVER_DATABASE_PATH: optionalString,
  PORT: z.coerce.number().int().min(0).max(65_535).default(8787),
  SUPABASE_URL: optionalString,
  SUPABASE_ANON_KEY: optionalString,
  SUPABASE_SERVICE_ROLE_KEY: optionalString,
});

export type AppConfig = z.infer<typeof configSchema>;

/**
 * Read configuration from the environment. Throws when a value is present but malformed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join(', ')}`);
  }
  return parsed.data;
}

/**
 * Supabase settings are optional. Without them cloud sync stays disabled.
 */
export function validateSupabaseConfig(config: AppConfig): boolean {
  if (!config.SUPABASE_URL || config.SUPABASE_URL === PLACEHOLDER_URL) {
    console.warn('Supabase URL not configured. Cloud sync will be disabled.');
    return false;
  }
  if (!config.SUPABASE_ANON_KEY || config.SUPABASE_ANON_KEY === PLACEHOLDER_KEY) {
    console.warn('Supabase anon key not configured. Cloud sync will be disabled.');
    return false;
  }
  return true;
}
