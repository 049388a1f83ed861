import { describe, expect, it } from 'vitest';
import { RingStats, RingSum } from '../metrics/RollingWindow';

describe('RingSum', () => {
  it('evicts the oldest sample and keeps the running sum exact', () => {
    const ring = new RingSum(3);
    expect(ring.add(1)).toBeNull();
    ring.add(2);
    ring.add(3);
    expect(ring.isFull()).toBe(true);
    expect(ring.sum()).toBe(6);

    expect(ring.add(4)).toBe(1);
    expect(ring.sum()).toBe(9);
    expect(ring.mean()).toBe(3);
    expect(ring.toArray()).toEqual([2, 3, 4]);
  });

  it('indexes from the newest sample', () => {
    const ring = new RingSum(3);
    [5, 6, 7, 8].forEach((v) => ring.add(v));
    expect(ring.back(0)).toBe(8);
    expect(ring.back(2)).toBe(6);
    expect(ring.back(3)).toBe(0);
  });

  it('stores non-finite samples as zero', () => {
    const ring = new RingSum(2);
    ring.add(Number.NaN);
    ring.add(Number.POSITIVE_INFINITY);
    expect(ring.sum()).toBe(0);
    expect(ring.count()).toBe(2);
  });
});

describe('RingStats', () => {
  it('returns a zero z-score below the volatility floor', () => {
    const stats = new RingStats(4);
    [100, 100, 100, 100].forEach((v) => stats.add(v));
    expect(stats.zScore(101, 0.001)).toBe(0);
    stats.add(104);
    // window 100, 100, 100, 104: mean 101, std sqrt(3)
    expect(stats.zScore(104, 0.001)).toBeCloseTo(3 / Math.sqrt(3), 9);
  });

  it('reports the variance of the current window only', () => {
    const stats = new RingStats(4);
    [2, 4, 4, 4, 5, 5, 7, 9].forEach((v) => stats.add(v));
    expect(stats.toArray()).toEqual([5, 5, 7, 9]);
    expect(stats.mean()).toBe(6.5);
    expect(stats.variance()).toBeCloseTo(2.75, 10);
  });

  it('matches a full recomputation after many evictions', () => {
    const stats = new RingStats(7);
    for (let i = 0; i < 50; i += 1) {
      stats.add(100 + Math.sin(i) * 3);
    }
    const window = stats.toArray();
    const mean = window.reduce((a, b) => a + b, 0) / window.length;
    const variance = window.reduce((a, b) => a + (b - mean) ** 2, 0) / window.length;
    expect(stats.mean()).toBeCloseTo(mean, 9);
    expect(stats.variance()).toBeCloseTo(variance, 6);
  });

  it('never reports a negative variance', () => {
    const stats = new RingStats(5);
    for (let i = 0; i < 20; i += 1) stats.add(1e8 + 0.1);
    expect(stats.variance()).toBeGreaterThanOrEqual(0);
  });
});
