import type { Histogram } from 'hdr-histogram-js';
import { build } from 'hdr-histogram-js';

import { RateWindow } from './rate-window';
import type { Outcome, StatusOrError } from './stats';
import { average, classifyOutcome, percentileOfSorted } from './stats';

/**
 * Final statistics of a run, handed to the reporting layer. Latencies are in
 * seconds; rates are fractions between 0 and 1.
 */
export interface RunSummary {
  totalRequests: number;
  successfulRequests: number;
  averageLatency: number;
  errorRate: number;
  successRate: number;
  p50: number;
  p90: number;
  p95: number;
  p99: number;
}

/**
 * Collects the outcome of every request attempt of a run and derives its
 * statistics. Workers call {@link record} concurrently; the method never
 * awaits, so each call is applied whole before another worker runs.
 */
export class OutcomeRecorder {
  private readonly outcomes: Outcome[] = [];
  private readonly statusCodeMap: Record<number, number> = {};
  private readonly errorMessageMap = new Map<string, number>();
  private readonly liveHistogram: Histogram = build();
  private readonly recentCompletions = new RateWindow(10000);
  private successCount = 0;
  private statusMismatchCount = 0;
  private transportErrorCount = 0;

  /**
   * Records one completed request attempt.
   * @param latencySeconds Time from issuing the request to its completion.
   * @param statusOrError The response status code, or the transport error.
   * @param expectedStatus The status code that counts as a success.
   * @returns The outcome as stored.
   */
  record(
    latencySeconds: number,
    statusOrError: StatusOrError,
    expectedStatus: number,
  ): Outcome {
    const result = classifyOutcome(statusOrError, expectedStatus);
    const latency = Math.max(0, latencySeconds);
    const timestamp = Date.now();

    let outcome: Outcome;
    if (typeof statusOrError === 'number') {
      outcome = {
        latencySeconds: latency,
        result,
        statusCode: statusOrError,
        timestamp,
      };
      this.statusCodeMap[statusOrError] =
        (this.statusCodeMap[statusOrError] || 0) + 1;
    } else {
      const error =
        typeof statusOrError === 'string' ? statusOrError : statusOrError.message;
      outcome = { latencySeconds: latency, result, error, timestamp };
      this.errorMessageMap.set(
        error,
        (this.errorMessageMap.get(error) || 0) + 1,
      );
    }

    if (result === 'success') this.successCount++;
    else if (result === 'status_mismatch') this.statusMismatchCount++;
    else this.transportErrorCount++;

    this.outcomes.push(outcome);
    this.liveHistogram.recordValue(Math.round(latency * 1000));
    this.recentCompletions.add(timestamp);
    return outcome;
  }

  get totalCount(): number {
    return this.outcomes.length;
  }

  getSuccessCount(): number {
    return this.successCount;
  }

  /** Status mismatches plus transport errors. */
  getErrorCount(): number {
    return this.statusMismatchCount + this.transportErrorCount;
  }

  getStatusMismatchCount(): number {
    return this.statusMismatchCount;
  }

  getTransportErrorCount(): number {
    return this.transportErrorCount;
  }

  /** All outcomes, in completion order. */
  getOutcomes(): readonly Outcome[] {
    return this.outcomes;
  }

  /** Latencies in seconds, in completion order. */
  getLatencies(): number[] {
    return this.outcomes.map((o) => o.latencySeconds);
  }

  /** Count of responses per status code. */
  getStatusCodeMap(): Record<number, number> {
    return this.statusCodeMap;
  }

  /** Count of transport errors per error message. */
  getErrorMessageMap(): ReadonlyMap<string, number> {
    return this.errorMessageMap;
  }

  /**
   * Millisecond latency histogram kept for live progress readouts. Its
   * percentiles are approximate; {@link summarize} is the exact figure.
   */
  getLiveHistogram(): Histogram {
    return this.liveHistogram;
  }

  /** Completions during the last second. */
  getCurrentRps(now: number = Date.now()): number {
    return this.recentCompletions.countSince(now - 1000);
  }

  /**
   * Computes the run statistics over everything recorded so far.
   */
  summarize(): RunSummary {
    const total = this.outcomes.length;
    const latencies = this.getLatencies();
    const sorted = [...latencies].sort((a, b) => a - b);

    return {
      totalRequests: total,
      successfulRequests: this.successCount,
      averageLatency: average(latencies),
      errorRate: total > 0 ? this.getErrorCount() / total : 0,
      successRate: total > 0 ? this.successCount / total : 0,
      p50: percentileOfSorted(sorted, 50),
      p90: percentileOfSorted(sorted, 90),
      p95: percentileOfSorted(sorted, 95),
      p99: percentileOfSorted(sorted, 99),
    };
  }
}
