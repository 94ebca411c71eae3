import { describe, it, expect } from 'vitest';
import { computeBackoffMs } from './backoff.js';

describe('computeBackoffMs', () => {
  it('steps through the delay table', () => {
    expect(computeBackoffMs(1)).toBe(1_000);
    expect(computeBackoffMs(2)).toBe(2_000);
    expect(computeBackoffMs(3)).toBe(5_000);
    expect(computeBackoffMs(4)).toBe(10_000);
  });

  it('stays at the last delay', () => {
    expect(computeBackoffMs(9)).toBe(10_000);
  });

  it('treats zero failures as the first', () => {
    expect(computeBackoffMs(0)).toBe(1_000);
  });
});
