import { z } from 'zod';
import type { MaintenanceConfig } from './models';

export const DEFAULT_RETRY_AFTER = '3600';
export const DEFAULT_STORAGE_TIMEOUT_MS = 3000;
export const DEFAULT_DOWNSTREAM_TIMEOUT_MS = 10000;

const text = (fallback: string) =>
  z
    .string()
    .optional()
    .transform((value) => (value === undefined ? fallback : value.trim()));

const timeout = (fallback: number) =>
  z.coerce.number().int().positive().catch(fallback);

// Every variable is optional; malformed values fall back to their defaults
const envSchema = z.object({
  MAINTENANCE_MODE: text('true').transform((value) => value.toLowerCase() === 'true'),
  S3_BUCKET: text('maintenance-pages'),
  S3_KEY: text('maintenance.html'),
  SPECIAL_URL_PATH: text(''),
  SPECIAL_LAMBDA_ARN: text(''),
  RETRY_AFTER_SECONDS: text(DEFAULT_RETRY_AFTER).transform((value) =>
    value === '' || /^\d+$/.test(value) ? value : DEFAULT_RETRY_AFTER,
  ),
  STORAGE_TIMEOUT_MS: timeout(DEFAULT_STORAGE_TIMEOUT_MS),
  DOWNSTREAM_TIMEOUT_MS: timeout(DEFAULT_DOWNSTREAM_TIMEOUT_MS),
});

export type Environment = Record<string, string | undefined>;

export function loadConfig(env: Environment): MaintenanceConfig {
  const parsed = envSchema.parse(env);

  return {
    maintenanceMode: parsed.MAINTENANCE_MODE,
    storage: {
      bucket: parsed.S3_BUCKET,
      key: parsed.S3_KEY,
    },
    specialPrefix: parsed.SPECIAL_URL_PATH,
    downstreamRef: parsed.SPECIAL_LAMBDA_ARN,
    retryAfter: parsed.RETRY_AFTER_SECONDS,
    storageTimeoutMs: parsed.STORAGE_TIMEOUT_MS,
    downstreamTimeoutMs: parsed.DOWNSTREAM_TIMEOUT_MS,
  };
}
