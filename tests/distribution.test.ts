import { describe, expect, it } from 'vitest';

import { Distribution } from '../src/distribution';

describe('Distribution', () => {
  it('should return no buckets for an empty run', () => {
    const distribution = new Distribution([]);
    expect(distribution.getTotalCount()).toBe(0);
    expect(distribution.getLatencyDistribution({ count: 5 })).toEqual([]);
  });

  /**
   * 125ms to 500ms over four buckets gives a bucket width of ceil(93.75).
   */
  it('should spread latencies over equal-width millisecond buckets', () => {
    const distribution = new Distribution([0.5, 0.125, 0.375, 0.25]);

    expect(
      distribution.getLatencyDistribution({ count: 4, chartWidth: 4 }),
    ).toEqual([
      {
        latency: '125-218',
        count: 1,
        percent: '25%',
        cumulative: '25%',
        chart: '████',
      },
      {
        latency: '219-312',
        count: 1,
        percent: '25%',
        cumulative: '50%',
        chart: '████',
      },
      {
        latency: '313-406',
        count: 1,
        percent: '25%',
        cumulative: '75%',
        chart: '████',
      },
      {
        latency: '407+',
        count: 1,
        percent: '25%',
        cumulative: '100%',
        chart: '████',
      },
    ]);
  });

  it('should put identical latencies in the first bucket', () => {
    const buckets = new Distribution([0.1, 0.1]).getLatencyDistribution({
      count: 3,
    });

    expect(buckets.map((b) => b.latency)).toEqual(['100-100', '101-101', '102+']);
    expect(buckets.map((b) => b.count)).toEqual([2, 0, 0]);
    expect(buckets[0].chart).toBe('█'.repeat(20));
    expect(buckets[1].chart).toBe('');
  });
});
