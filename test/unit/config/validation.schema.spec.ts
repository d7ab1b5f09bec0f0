import { describe, it, expect } from 'vitest';
import { validateEnv } from '../../../src/config/validation.schema';
import { buildConfig } from '../../../src/config/configuration';
import { createTestCollections } from '../helpers/mock-factories';

describe('validation.schema', () => {
  const required = { BILI_SESSDATA: 'test-secret', BILI_JCT: 'test-csrf' };

  it('should apply defaults', () => {
    const env = validateEnv(required);

    expect(env.PORT).toBe(8000);
    expect(env.SYNC_INTERVAL_SECONDS).toBe(1200);
    expect(env.MAX_CONCURRENT_TASKS).toBe(3);
    expect(env.TASK_ABORT_GRACE_MS).toBe(15000);
    expect(env.RECONCILE_FAIL_STUCK_EXECUTING).toBe(true);
    expect(env.RECONCILE_PRUNE_ORPHANED_PENDING).toBe(false);
    expect(env.COLLECTIONS_FILE).toBe('config/collections.json');
  });

  it('should coerce numeric and boolean strings', () => {
    const env = validateEnv({
      ...required,
      MAX_CONCURRENT_TASKS: '8',
      DYNAMODB_CREATE_TABLE: 'true',
    });

    expect(env.MAX_CONCURRENT_TASKS).toBe(8);
    expect(env.DYNAMODB_CREATE_TABLE).toBe(true);
  });

  it('should require the catalog credentials', () => {
    expect(() => validateEnv({})).toThrow(/BILI_SESSDATA/);
  });

  it('should reject a concurrency below one', () => {
    expect(() => validateEnv({ ...required, MAX_CONCURRENT_TASKS: '0' })).toThrow(
      /MAX_CONCURRENT_TASKS/,
    );
  });

  describe('buildConfig', () => {
    it('should convert retry seconds to milliseconds', () => {
      const env = validateEnv({
        ...required,
        RETRY_BACKOFF_BASE_SECONDS: '2',
        RETRY_BACKOFF_MAX_SECONDS: '30',
      });

      expect(buildConfig(env, createTestCollections()).retry).toEqual({
        maxAttempts: 5,
        backoffBaseMs: 2000,
        backoffMaxMs: 30000,
      });
    });

    it('should only set AWS credentials when both halves are present', () => {
      const partial = buildConfig(validateEnv({ ...required, AWS_ACCESS_KEY_ID: 'test-key' }), []);
      const full = buildConfig(
        validateEnv({ ...required, AWS_ACCESS_KEY_ID: 'test-key', AWS_SECRET_ACCESS_KEY: 'test-secret' }),
        [],
      );

      expect(partial.aws.credentials).toBeUndefined();
      expect(full.aws.credentials).toEqual({ accessKeyId: 'test-key', secretAccessKey: 'test-secret' });
    });
  });
});
