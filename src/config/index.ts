/**
 * Process configuration, read once from the environment.
 *
 * The CLI loads `.env` (dotenv) before this module is evaluated, so values
 * from the file and from the real environment are treated the same way.
 */

export interface AppConfig {
  databaseUrl: string;
  dbPoolMax: number;
  /** Rows per ingestion chunk; each chunk is committed as one transaction. */
  ingestChunkSize: number;
  isProd: boolean;
}

export const DEFAULT_DATABASE_URL = 'postgresql://localhost/opsight';
export const DEFAULT_CHUNK_SIZE = 50_000;

/**
 * Parse a positive integer from an env var, with safe default.
 * Returns fallback if env is empty, non-numeric, fractional or not positive.
 */
export function envPositiveInt(value: string | undefined, fallback: number): number {
  if (!value || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export function readConfig(env: NodeJS.ProcessEnv): AppConfig {
  return {
    databaseUrl: env.DATABASE_URL?.trim() || DEFAULT_DATABASE_URL,
    dbPoolMax: envPositiveInt(env.DB_POOL_MAX, 5),
    ingestChunkSize: envPositiveInt(env.INGEST_CHUNK_SIZE, DEFAULT_CHUNK_SIZE),
    isProd: env.NODE_ENV === 'production',
  };
}

export const config: AppConfig = readConfig(process.env);
