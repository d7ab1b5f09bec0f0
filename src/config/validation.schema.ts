import { z } from 'zod';

const booleanFlag = (defaultValue: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(defaultValue)
    .transform((value) => value === 'true');

export const envSchema = z.object({
  // Core
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(8000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // AWS
  AWS_REGION: z.string().default('us-east-1'),
  AWS_ACCESS_KEY_ID: z.string().optional(),
  AWS_SECRET_ACCESS_KEY: z.string().optional(),
  AWS_ENDPOINT: z.string().url().optional(), // For DynamoDB Local

  // DynamoDB
  DYNAMODB_TABLE_NAME: z.string().default('favsync-jobs'),
  DYNAMODB_CREATE_TABLE: booleanFlag('false'),

  // Scheduling
  SYNC_INTERVAL_SECONDS: z.coerce.number().int().min(1).default(1200),
  REQUEST_TIMEOUT_SECONDS: z.coerce.number().int().min(1).default(300),
  MAX_CONCURRENT_TASKS: z.coerce.number().int().min(1).max(32).default(3),
  TASK_TIMEOUT_SECONDS: z.coerce.number().int().min(1).default(600),
  TASK_ABORT_GRACE_MS: z.coerce.number().int().min(0).default(15000),
  CONSUMER_POLL_INTERVAL_MS: z.coerce.number().int().min(10).default(1000),
  CONSUMER_ERROR_BACKOFF_MS: z.coerce.number().int().min(10).default(5000),

  // Retry
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(0).default(5),
  RETRY_BACKOFF_BASE_SECONDS: z.coerce.number().min(0).default(60),
  RETRY_BACKOFF_MAX_SECONDS: z.coerce.number().min(0).default(3600),

  // Reconciliation
  RECONCILE_INTERVAL_SECONDS: z.coerce.number().int().min(1).default(300),
  RECONCILE_FAIL_STUCK_EXECUTING: booleanFlag('true'),
  RECONCILE_STUCK_GRACE_SECONDS: z.coerce.number().int().min(0).default(60),
  RECONCILE_PRUNE_ORPHANED_PENDING: booleanFlag('false'),

  // Catalog credentials
  BILI_SESSDATA: z.string().min(1),
  BILI_JCT: z.string().min(1),
  BILI_BUVID3: z.string().optional(),
  BILI_DEDEUSERID: z.string().optional(),
  BILI_AC_TIME_VALUE: z.string().optional(),
  BILI_API_BASE_URL: z.string().url().default('https://api.bilibili.com'),
  BILI_VIDEO_BASE_URL: z.string().url().default('https://www.bilibili.com/video'),

  // Downloader
  DOWNLOADER_BIN: z.string().default('yutto'),

  // Collections
  COLLECTIONS_FILE: z.string().default('config/collections.json'),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const result = envSchema.safeParse(config);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }

  return result.data;
}
