/**
 * One row of a latency distribution table.
 */
export interface LatencyBucket {
  /** Range label in milliseconds, e.g. `100-149` or `450+` for the last bucket. */
  latency: string;
  count: number;
  /** Share of all samples in this bucket, e.g. `25%`. */
  percent: string;
  /** Share of all samples at or below this bucket. */
  cumulative: string;
  /** Bar scaled against the fullest bucket. */
  chart: string;
}

export interface DistributionOptions {
  /** Number of buckets. */
  count: number;
  /** Width of the bar of the fullest bucket, in characters. Defaults to 20. */
  chartWidth?: number;
}

/**
 * Groups latencies into equal-width millisecond buckets between the fastest
 * and the slowest sample. A text stand-in for a latency histogram.
 */
export class Distribution {
  private readonly sortedMs: number[];

  /**
   * @param latenciesSeconds Latencies in seconds, in any order.
   */
  constructor(latenciesSeconds: readonly number[]) {
    this.sortedMs = latenciesSeconds
      .map((seconds) => seconds * 1000)
      .sort((a, b) => a - b);
  }

  getTotalCount(): number {
    return this.sortedMs.length;
  }

  getLatencyDistribution(options: DistributionOptions): LatencyBucket[] {
    const total = this.sortedMs.length;
    if (total === 0 || options.count <= 0) {
      return [];
    }

    const min = Math.floor(this.sortedMs[0]);
    const max = this.sortedMs[total - 1];
    const bucketSize = Math.ceil((max - min) / options.count) || 1;

    const counts = new Array<number>(options.count).fill(0);
    for (const latency of this.sortedMs) {
      const index = Math.min(
        Math.floor((latency - min) / bucketSize),
        options.count - 1,
      );
      counts[index]++;
    }

    const fullest = Math.max(...counts);
    const chartWidth = options.chartWidth ?? 20;
    let cumulative = 0;

    return counts.map((count, i) => {
      cumulative += count;
      const lower = min + i * bucketSize;
      const isLast = i === options.count - 1;
      return {
        latency: isLast ? `${lower}+` : `${lower}-${lower + bucketSize - 1}`,
        count,
        percent: `${((count / total) * 100).toFixed(0)}%`,
        cumulative: `${((cumulative / total) * 100).toFixed(0)}%`,
        chart: '█'.repeat(Math.round((count / fullest) * chartWidth)),
      };
    });
  }
}
