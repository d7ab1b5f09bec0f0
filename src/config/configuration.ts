/**
 * Application Configuration
 *
 * Loads and validates environment variables and the collections file,
 * providing type-safe access through `ConfigService<AppConfig>`.
 *
 * ## Configuration Sources:
 * 1. Environment variables (`.env` file or system environment), validated by
 *    the Zod schema in `validation.schema.ts`
 * 2. The collections JSON file named by `COLLECTIONS_FILE`, validated by
 *    `collections.schema.ts`
 *
 * ## Usage:
 * ```typescript
 * constructor(private configService: ConfigService<AppConfig>) {}
 *
 * const sync = this.configService.get('sync', { infer: true });
 * ```
 *
 * @module Configuration
 */

import { validateEnv, EnvConfig } from './validation.schema';
import { CollectionConfig, loadCollections } from './collections.schema';

export interface CatalogCredentials {
  sessdata: string;
  biliJct: string;
  buvid3?: string;
  dedeuserid?: string;
  acTimeValue?: string;
}

export interface AppConfig {
  nodeEnv: string;
  port: number;
  logLevel: string;
  aws: {
    region: string;
    endpoint?: string;
    credentials?: {
      accessKeyId: string;
      secretAccessKey: string;
    };
  };
  dynamodb: {
    tableName: string;
    /** Create the table and its indexes at startup when missing (local development) */
    createTable: boolean;
  };
  /**
   * Scheduling of the producer, consumer and executor.
   *
   * ### intervalSeconds (SYNC_INTERVAL_SECONDS)
   * Pause between two catalog scans. Scanning is rate limited upstream; keep
   * it in the tens of minutes.
   *
   * ### maxConcurrentTasks (MAX_CONCURRENT_TASKS)
   * Permits of the job pool, i.e. downloader processes running at once.
   *
   * ### taskTimeoutSeconds (TASK_TIMEOUT_SECONDS)
   * Upper bound for one job's download plus postprocess. The job is failed
   * and its downloader killed when it elapses.
   *
   * ### abortGraceMs (TASK_ABORT_GRACE_MS)
   * How long a timed-out or cancelled job keeps its permit while its work
   * winds down. Must cover the downloader's SIGTERM to SIGKILL delay.
   */
  sync: {
    intervalSeconds: number;
    requestTimeoutSeconds: number;
    maxConcurrentTasks: number;
    taskTimeoutSeconds: number;
    abortGraceMs: number;
    consumerPollIntervalMs: number;
    consumerErrorBackoffMs: number;
  };
  retry: {
    maxAttempts: number;
    backoffBaseMs: number;
    backoffMaxMs: number;
  };
  reconcile: {
    intervalSeconds: number;
    failStuckExecuting: boolean;
    stuckGraceSeconds: number;
    pruneOrphanedPending: boolean;
  };
  catalog: {
    apiBaseUrl: string;
    videoBaseUrl: string;
    credentials: CatalogCredentials;
  };
  downloader: {
    bin: string;
  };
  collections: CollectionConfig[];
}

export function buildConfig(env: EnvConfig, collections: CollectionConfig[]): AppConfig {
  const config: AppConfig = {
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    aws: {
      region: env.AWS_REGION,
      endpoint: env.AWS_ENDPOINT,
    },
    dynamodb: {
      tableName: env.DYNAMODB_TABLE_NAME,
      createTable: env.DYNAMODB_CREATE_TABLE,
    },
    sync: {
      intervalSeconds: env.SYNC_INTERVAL_SECONDS,
      requestTimeoutSeconds: env.REQUEST_TIMEOUT_SECONDS,
      maxConcurrentTasks: env.MAX_CONCURRENT_TASKS,
      taskTimeoutSeconds: env.TASK_TIMEOUT_SECONDS,
      abortGraceMs: env.TASK_ABORT_GRACE_MS,
      consumerPollIntervalMs: env.CONSUMER_POLL_INTERVAL_MS,
      consumerErrorBackoffMs: env.CONSUMER_ERROR_BACKOFF_MS,
    },
    retry: {
      maxAttempts: env.RETRY_MAX_ATTEMPTS,
      backoffBaseMs: env.RETRY_BACKOFF_BASE_SECONDS * 1000,
      backoffMaxMs: env.RETRY_BACKOFF_MAX_SECONDS * 1000,
    },
    reconcile: {
      intervalSeconds: env.RECONCILE_INTERVAL_SECONDS,
      failStuckExecuting: env.RECONCILE_FAIL_STUCK_EXECUTING,
      stuckGraceSeconds: env.RECONCILE_STUCK_GRACE_SECONDS,
      pruneOrphanedPending: env.RECONCILE_PRUNE_ORPHANED_PENDING,
    },
    catalog: {
      apiBaseUrl: env.BILI_API_BASE_URL,
      videoBaseUrl: env.BILI_VIDEO_BASE_URL,
      credentials: {
        sessdata: env.BILI_SESSDATA,
        biliJct: env.BILI_JCT,
        buvid3: env.BILI_BUVID3,
        dedeuserid: env.BILI_DEDEUSERID,
        acTimeValue: env.BILI_AC_TIME_VALUE,
      },
    },
    downloader: {
      bin: env.DOWNLOADER_BIN,
    },
    collections,
  };

  // Add AWS credentials only if explicitly provided
  if (env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY) {
    config.aws.credentials = {
      accessKeyId: env.AWS_ACCESS_KEY_ID,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
    };
  }

  return config;
}

export default (): AppConfig => {
  const env: EnvConfig = validateEnv(process.env);
  return buildConfig(env, loadCollections(env.COLLECTIONS_FILE));
};
