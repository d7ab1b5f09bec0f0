import { describe, it, expect } from 'vitest';
import {
  JobStatus,
  JobStatusVO,
  assertAutomaticTransition,
  isJobStatus,
  toStatusChange,
} from '../../../src/domain/value-objects/job-status.vo';
import { InvalidStatusChangeError } from '../../../src/domain/errors/job.errors';

describe('JobStatusVO', () => {
  describe('fromString', () => {
    it('should accept the lowercase wire form', () => {
      expect(JobStatusVO.fromString('executing').value).toBe(JobStatus.EXECUTING);
    });

    it('should trim and accept mixed case', () => {
      expect(JobStatusVO.fromString('  Failed ').value).toBe(JobStatus.FAILED);
    });

    it('should reject unknown statuses', () => {
      expect(() => JobStatusVO.fromString('done')).toThrow('Invalid job status: done');
    });
  });

  it('should expose the lowercase wire value', () => {
    expect(JobStatusVO.completed().wireValue).toBe('completed');
  });

  it('should classify terminal and active statuses', () => {
    expect(JobStatusVO.completed().isTerminal()).toBe(true);
    expect(JobStatusVO.failed().isTerminal()).toBe(true);
    expect(JobStatusVO.pending().isActive()).toBe(true);
    expect(JobStatusVO.executing().isActive()).toBe(true);
    expect(JobStatusVO.executing().isTerminal()).toBe(false);
  });

  describe('canTransitionTo', () => {
    it('should allow the automatic lifecycle', () => {
      expect(JobStatusVO.pending().canTransitionTo(JobStatusVO.executing())).toBe(true);
      expect(JobStatusVO.executing().canTransitionTo(JobStatusVO.completed())).toBe(true);
      expect(JobStatusVO.executing().canTransitionTo(JobStatusVO.failed())).toBe(true);
      expect(JobStatusVO.failed().canTransitionTo(JobStatusVO.pending())).toBe(true);
      expect(JobStatusVO.executing().canTransitionTo(JobStatusVO.pending())).toBe(true);
    });

    it('should never leave COMPLETED automatically', () => {
      for (const status of [JobStatus.PENDING, JobStatus.EXECUTING, JobStatus.FAILED]) {
        expect(JobStatusVO.completed().canTransitionTo(JobStatusVO.of(status))).toBe(false);
      }
    });

    it('should not complete or fail a job that was never claimed', () => {
      expect(JobStatusVO.pending().canTransitionTo(JobStatusVO.completed())).toBe(false);
      expect(JobStatusVO.pending().canTransitionTo(JobStatusVO.failed())).toBe(false);
    });

    it('should reject a disallowed compare-and-set with InvalidStatusChangeError', () => {
      expect(() => assertAutomaticTransition(JobStatus.PENDING, JobStatus.COMPLETED)).toThrow(
        InvalidStatusChangeError,
      );
      expect(() => assertAutomaticTransition(JobStatus.EXECUTING, JobStatus.COMPLETED)).not.toThrow();
    });
  });

  it('should recognise stored status strings', () => {
    expect(isJobStatus('PENDING')).toBe(true);
    expect(isJobStatus('pending')).toBe(false);
  });
});

describe('toStatusChange', () => {
  it('should carry the message for FAILED', () => {
    expect(toStatusChange(JobStatus.FAILED, 'boom')).toEqual({
      status: JobStatus.FAILED,
      errorMessage: 'boom',
    });
  });

  it('should reject FAILED without a message', () => {
    expect(() => toStatusChange(JobStatus.FAILED)).toThrow(InvalidStatusChangeError);
    expect(() => toStatusChange(JobStatus.FAILED, '')).toThrow(
      'A FAILED status change requires an error message',
    );
  });

  it('should drop the message for other statuses', () => {
    expect(toStatusChange(JobStatus.COMPLETED, 'ignored')).toEqual({ status: JobStatus.COMPLETED });
  });
});
