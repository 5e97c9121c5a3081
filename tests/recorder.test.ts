import { afterEach, describe, expect, it, vi } from 'vitest';

import { OutcomeRecorder } from '../src/recorder';

describe('OutcomeRecorder', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should summarize an empty run as zeros', () => {
    const recorder = new OutcomeRecorder();

    expect(recorder.summarize()).toEqual({
      totalRequests: 0,
      successfulRequests: 0,
      averageLatency: 0,
      errorRate: 0,
      successRate: 0,
      p50: 0,
      p90: 0,
      p95: 0,
      p99: 0,
    });
  });

  it('should summarize five successful requests', () => {
    const recorder = new OutcomeRecorder();
    for (const latency of [0.5, 0.1, 0.4, 0.2, 0.3]) {
      recorder.record(latency, 200, 200);
    }

    const summary = recorder.summarize();
    expect(summary.totalRequests).toBe(5);
    expect(summary.successfulRequests).toBe(5);
    expect(summary.averageLatency).toBeCloseTo(0.3, 10);
    expect(summary.errorRate).toBe(0);
    expect(summary.successRate).toBe(1);
    expect(summary.p50).toBe(0.3);
    expect(summary.p90).toBe(0.5);
    expect(summary.p95).toBe(0.5);
    expect(summary.p99).toBe(0.5);
  });

  /**
   * Two successes, one 500 and one refused connection: both failures count
   * towards the error rate, and every latency counts towards the percentiles.
   */
  it('should count status mismatches and transport errors as errors', () => {
    const recorder = new OutcomeRecorder();
    recorder.record(0.1, 200, 200);
    recorder.record(0.2, 200, 200);
    recorder.record(0.3, 500, 200);
    recorder.record(0.4, new Error('connect ECONNREFUSED'), 200);

    const summary = recorder.summarize();
    expect(summary.totalRequests).toBe(4);
    expect(summary.successfulRequests).toBe(2);
    expect(summary.errorRate).toBe(0.5);
    expect(summary.successRate).toBe(0.5);
    expect(summary.p50).toBe(0.2);

    expect(recorder.getStatusMismatchCount()).toBe(1);
    expect(recorder.getTransportErrorCount()).toBe(1);
    expect(recorder.getErrorCount()).toBe(2);
    expect(recorder.getStatusCodeMap()).toEqual({ 200: 2, 500: 1 });
    expect(Array.from(recorder.getErrorMessageMap())).toEqual([
      ['connect ECONNREFUSED', 1],
    ]);
  });

  it('should store outcomes in completion order', () => {
    vi.useFakeTimers();
    vi.setSystemTime(1_000);
    const recorder = new OutcomeRecorder();

    const first = recorder.record(0.05, 201, 200);
    vi.setSystemTime(1_500);
    const second = recorder.record(0.07, 'socket hang up', 200);

    expect(first).toEqual({
      latencySeconds: 0.05,
      result: 'status_mismatch',
      statusCode: 201,
      timestamp: 1_000,
    });
    expect(second).toEqual({
      latencySeconds: 0.07,
      result: 'transport_error',
      error: 'socket hang up',
      timestamp: 1_500,
    });
    expect(recorder.getOutcomes()).toEqual([first, second]);
    expect(recorder.getLatencies()).toEqual([0.05, 0.07]);
    expect(recorder.totalCount).toBe(2);
  });

  it('should clamp negative latencies to zero', () => {
    const recorder = new OutcomeRecorder();
    const outcome = recorder.record(-0.001, 200, 200);
    expect(outcome.latencySeconds).toBe(0);
  });

  it('should feed the live histogram in milliseconds', () => {
    const recorder = new OutcomeRecorder();
    recorder.record(0.1, 200, 200);
    recorder.record(0.3, 200, 200);

    const histogram = recorder.getLiveHistogram();
    expect(histogram.totalCount).toBe(2);
    expect(histogram.minNonZeroValue).toBe(100);
  });

  it('should report completions during the last second', () => {
    vi.useFakeTimers();
    vi.setSystemTime(10_000);
    const recorder = new OutcomeRecorder();
    recorder.record(0.01, 200, 200);
    vi.setSystemTime(10_600);
    recorder.record(0.01, 200, 200);
    recorder.record(0.01, 200, 200);

    expect(recorder.getCurrentRps(10_700)).toBe(3);
    expect(recorder.getCurrentRps(11_200)).toBe(2);
    expect(recorder.getCurrentRps(12_000)).toBe(0);
  });
});
