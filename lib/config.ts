// Centralized runtime configuration for timeouts, retries and file locations.
// Values are read from env with sane defaults and can be overridden in tests.
import { z } from 'zod';
import { ConfigError } from './errors';

/** Integer env var at or above `min`; anything else falls back. */
export function envInt(name: string, fallback: number, min = 1): number {
  const v = process.env[name];
  if (!v) return fallback;
  const n = Number(v);
  return Number.isInteger(n) && n >= min ? n : fallback;
}

export const CONFIG = {
  HTTP_TIMEOUT_MS: envInt('HTTP_TIMEOUT_MS', 10_000), // per IP-echo attempt
  CLOUDFLARE_TIMEOUT_MS: envInt('CLOUDFLARE_TIMEOUT_MS', 30_000),
  CLOUDFLARE_API_URL: process.env.CLOUDFLARE_API_URL || 'https://api.cloudflare.com/client/v4',

  RETRY: {
    MAX_RETRIES: envInt('RETRY_MAX_RETRIES', 3, 0), // 0 = single attempt
    INITIAL_DELAY_MS: envInt('RETRY_INITIAL_DELAY_MS', 1000),
    MAX_DELAY_MS: envInt('RETRY_MAX_DELAY_MS', 60_000),
  },

  CONCURRENCY: {
    PER_HOST: envInt('CONCURRENCY_PER_HOST', 4),
  },

  BACKUP_DIR: process.env.BACKUP_DIR || 'backups',
  STATUS_FILE: process.env.STATUS_FILE || 'dns-ip-sync_status.txt',
  METRICS_PORT: envInt('METRICS_PORT', 0), // 0 = disabled

  USER_AGENT: 'dns-ip-sync/0.1',
};

export default CONFIG;

/** Settings the operator must provide. */
export interface SyncConfig {
  apiToken: string;
  zoneId: string;
  domainNames: string[];
  updateIntervalMinutes: number;
}

export function splitDomainNames(raw: string): string[] {
  return raw
    .split(/[,;]/)
    .map((s) => s.trim())
    .filter(Boolean);
}

const required = (name: string) =>
  z.string({ required_error: `${name} must be set` }).trim().min(1, `${name} must be set`);

const SyncEnvSchema = z.object({
  CLOUDFLARE_API_TOKEN: required('CLOUDFLARE_API_TOKEN'),
  CLOUDFLARE_ZONE_ID: required('CLOUDFLARE_ZONE_ID'),
  DOMAIN_NAME: required('DOMAIN_NAME')
    .transform(splitDomainNames)
    .refine((names) => names.length > 0, 'DOMAIN_NAME must list at least one domain'),
  UPDATE_INTERVAL: required('UPDATE_INTERVAL')
    .regex(/^\d+$/, 'UPDATE_INTERVAL must be a whole number of minutes')
    .transform(Number)
    .refine((n) => n >= 1, 'UPDATE_INTERVAL must be at least 1 minute'),
});

/**
 * Read the operator settings from the environment.
 * Throws ConfigError naming every offending variable.
 */
export function loadSyncConfig(env: NodeJS.ProcessEnv = process.env): SyncConfig {
  const parsed = SyncEnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => i.message);
    throw new ConfigError(problems.join('; '), { cause: parsed.error });
  }
  const e = parsed.data;
  return {
    apiToken: e.CLOUDFLARE_API_TOKEN,
    zoneId: e.CLOUDFLARE_ZONE_ID,
    domainNames: e.DOMAIN_NAME,
    updateIntervalMinutes: e.UPDATE_INTERVAL,
  };
}
