import { resolve } from "node:path";
import { z } from "zod";
import { DEFAULT_AUTO_SYNC_INTERVAL_MS } from "../domain/sync/autoSyncScheduler";
import {
  RECORDS_FILE_NAME,
  SETTINGS_FILE_NAME,
  DEFAULT_DATA_DIR,
} from "../utils/constants";

export interface SupabaseConfig {
  url: string;
  anonKey: string;
  accessToken?: string;
}

export interface JournalConfig {
  dataDir: string;
  recordsFile: string;
  settingsFile: string;
  autoSyncIntervalMs: number;
  supabase: SupabaseConfig | null;
}

const emptyToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const envSchema = z.object({
  JOURNAL_DATA_DIR: z.preprocess(emptyToUndefined, z.string().optional()),
  JOURNAL_AUTO_SYNC_INTERVAL_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().optional(),
  ),
  JOURNAL_SUPABASE_URL: z.preprocess(
    emptyToUndefined,
    z.string().url().optional(),
  ),
  JOURNAL_SUPABASE_ANON_KEY: z.preprocess(emptyToUndefined, z.string().optional()),
  JOURNAL_SUPABASE_ACCESS_TOKEN: z.preprocess(
    emptyToUndefined,
    z.string().optional(),
  ),
});

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Reads configuration from the environment. The remote is configured only
 * when both the Supabase URL and anon key are present.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): JournalConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const values = parsed.data;
  const dataDir = resolve(cwd, values.JOURNAL_DATA_DIR ?? DEFAULT_DATA_DIR);

  const supabase =
    values.JOURNAL_SUPABASE_URL && values.JOURNAL_SUPABASE_ANON_KEY
      ? {
          url: values.JOURNAL_SUPABASE_URL,
          anonKey: values.JOURNAL_SUPABASE_ANON_KEY,
          accessToken: values.JOURNAL_SUPABASE_ACCESS_TOKEN,
        }
      : null;

  return {
    dataDir,
    recordsFile: resolve(dataDir, RECORDS_FILE_NAME),
    settingsFile: resolve(dataDir, SETTINGS_FILE_NAME),
    autoSyncIntervalMs:
      values.JOURNAL_AUTO_SYNC_INTERVAL_MS ?? DEFAULT_AUTO_SYNC_INTERVAL_MS,
    supabase,
  };
}
