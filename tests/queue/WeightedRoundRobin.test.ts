import { WeightedRoundRobin, JobPriority, PRIORITIES } from '@jobline/core';

describe('WeightedRoundRobin', () => {
  it('should pick keys in proportion to their weights over a cycle', () => {
    const wrr = new WeightedRoundRobin(PRIORITIES.map(p => [p, p] as const));
    const counts = new Map<JobPriority, number>();

    for (let i = 0; i < 16; i++) {
      const key = wrr.next();
      if (key !== null) counts.set(key, (counts.get(key) ?? 0) + 1);
    }

    expect(counts.get(JobPriority.High)).toBe(10);
    expect(counts.get(JobPriority.Normal)).toBe(5);
    expect(counts.get(JobPriority.Low)).toBe(1);
  });

  it('should interleave rather than burst', () => {
    const wrr = new WeightedRoundRobin([['a', 2], ['b', 1]] as const);
    const picks = Array.from({ length: 6 }, () => wrr.next());

    expect(picks).toEqual(['a', 'b', 'a', 'a', 'b', 'a']);
  });

  it('should skip unavailable keys', () => {
    const wrr = new WeightedRoundRobin([['a', 5], ['b', 1]] as const);

    expect(wrr.next(key => key === 'b')).toBe('b');
    expect(wrr.next(() => false)).toBeNull();
  });

  it('should restart the cycle after reset', () => {
    const wrr = new WeightedRoundRobin([['a', 1], ['b', 1]] as const);
    expect(wrr.next()).toBe('a');
    wrr.reset();
    expect(wrr.next()).toBe('a');
  });

  it('should reject non-positive weights', () => {
    expect(() => new WeightedRoundRobin([['a', 0]] as const)).toThrow('Weights must be greater than 0');
  });
});
