import { computeBackoffMs, computeRetryDelayMs, DEFAULT_RETRY_POLICY } from '../../src/server/retry';

describe('computeBackoffMs', () => {
  it('doubles from the base and stops at the cap', () => {
    expect([1, 2, 3, 4, 5, 6].map((a) => computeBackoffMs(a, 30_000, 600_000))).toEqual([
      30_000, 60_000, 120_000, 240_000, 480_000, 600_000,
    ]);
  });

  it('treats nonsense attempts as the first', () => {
    expect(computeBackoffMs(0, 1000, 10_000)).toBe(1000);
    expect(computeBackoffMs(Number.NaN, 1000, 10_000)).toBe(1000);
    expect(computeBackoffMs(2.9, 1000, 10_000)).toBe(2000);
  });
});

describe('computeRetryDelayMs', () => {
  it('scales by at most the jitter fraction', () => {
    expect(computeRetryDelayMs(1, DEFAULT_RETRY_POLICY, () => 0)).toBe(24_000);
    expect(computeRetryDelayMs(1, DEFAULT_RETRY_POLICY, () => 0.5)).toBe(30_000);
    expect(computeRetryDelayMs(1, DEFAULT_RETRY_POLICY, () => 1)).toBe(36_000);
  });

  it('applies jitter after the cap', () => {
    expect(computeRetryDelayMs(10, DEFAULT_RETRY_POLICY, () => 1)).toBe(720_000);
  });

  it('clamps the jitter fraction to 0..1', () => {
    expect(computeRetryDelayMs(1, { baseMs: 1000, maxMs: 1000, jitter: -1 }, () => 0)).toBe(1000);
    expect(computeRetryDelayMs(1, { baseMs: 1000, maxMs: 1000, jitter: 5 }, () => 0)).toBe(0);
  });
});
