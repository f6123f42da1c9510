import { describe, it, expect } from 'vitest';
import { resolveCorrelationId } from './correlation-id.decorator';

describe('resolveCorrelationId', () => {
  it('should reuse the caller supplied header', () => {
    expect(resolveCorrelationId('corr-42')).toBe('corr-42');
  });

  it('should generate an id when the header is missing or repeated', () => {
    expect(resolveCorrelationId(undefined)).toMatch(/^[0-9a-f-]{36}$/);
    expect(resolveCorrelationId(['a', 'b'])).toMatch(/^[0-9a-f-]{36}$/);
    expect(resolveCorrelationId('')).toMatch(/^[0-9a-f-]{36}$/);
  });
});
