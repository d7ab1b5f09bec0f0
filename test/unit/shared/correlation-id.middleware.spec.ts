import { describe, it, expect } from 'vitest';
import { validate as isUuid } from 'uuid';
import { resolveCorrelationId } from '../../../src/shared/logging/correlation-id.middleware';

describe('resolveCorrelationId', () => {
  it('should keep an incoming id', () => {
    expect(resolveCorrelationId(' req-42 ')).toBe('req-42');
  });

  it('should take the first of repeated headers', () => {
    expect(resolveCorrelationId(['req-1', 'req-2'])).toBe('req-1');
  });

  it('should generate an id when none was sent', () => {
    expect(isUuid(resolveCorrelationId(undefined))).toBe(true);
    expect(isUuid(resolveCorrelationId('  '))).toBe(true);
  });
});
