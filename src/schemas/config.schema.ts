import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  SITE_PROFILE_PATH: z.string().min(1).default('profiles/federal-id/profile.json'),
  START_URL: z.string().url().optional(),
  HEADLESS: booleanFlag.default('true'),
  BROWSER_EXECUTABLE_PATH: z.string().min(1).optional(),
  KEEP_BROWSER_OPEN: booleanFlag.default('false'),
  RUNS_DIR: z.string().min(1).default('runs'),
  ACTION_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  ACTION_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  RETRY_BACKOFF_MS: z.coerce.number().int().min(0).default(500),
  SETTLE_DELAY_MS: z.coerce.number().int().min(0).default(1_500),
  DOWNLOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  DOWNLOAD_POLL_MS: z.coerce.number().int().positive().default(500),
  RUN_TIMEOUT_MS: z.coerce.number().int().positive().default(600_000),
  STORAGE_BASE_URL: z.string().url().optional(),
  STORAGE_API_KEY: z.string().min(1).optional(),
  CRM_BASE_URL: z.string().url().optional(),
  CRM_API_KEY: z.string().min(1).optional(),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
});
