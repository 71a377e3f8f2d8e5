import { describe, it, expect } from 'vitest';
import { backoffDelay, DEFAULT_RETRY_POLICY } from '../src/pipeline/retry';

describe('backoffDelay', () => {
  const policy = { ...DEFAULT_RETRY_POLICY, jitter: false };

  it('should double per attempt', () => {
    expect([1, 2, 3, 4].map((a) => backoffDelay(a, policy))).toEqual([1000, 2000, 4000, 8000]);
  });

  it('should cap at the maximum delay', () => {
    expect(backoffDelay(10, { ...policy, maxDelayMs: 5000 })).toBe(5000);
  });

  it('should keep jitter between half and the full delay', () => {
    const jittered = { ...policy, jitter: true };
    expect(backoffDelay(2, jittered, () => 0)).toBe(1000);
    expect(backoffDelay(2, jittered, () => 1)).toBe(2000);
    expect(backoffDelay(2, jittered, () => 0.5)).toBe(1500);
  });
});
