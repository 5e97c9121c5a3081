/**
 * How a completed request attempt is classified.
 * - `success`: the server answered with the expected status code.
 * - `status_mismatch`: the server answered, but with another status code.
 * - `transport_error`: no usable response (connection refused, timeout, DNS...).
 */
export type OutcomeResult = 'success' | 'status_mismatch' | 'transport_error';

/**
 * The recorded result of one completed request attempt.
 */
export interface Outcome {
  /** Time from issuing the request to its completion or failure, in seconds. */
  readonly latencySeconds: number;
  readonly result: OutcomeResult;
  /** The response status code, when the server responded. */
  readonly statusCode?: number;
  /** The transport error message, for `transport_error` outcomes. */
  readonly error?: string;
  /** Completion time, milliseconds since the epoch. */
  readonly timestamp: number;
}

/**
 * Either the status code of a response, or the error that prevented one.
 */
export type StatusOrError = number | Error | string;

/**
 * Classifies a request attempt. Any error wins over the status code.
 */
export function classifyOutcome(
  statusOrError: StatusOrError,
  expectedStatus: number,
): OutcomeResult {
  if (typeof statusOrError !== 'number') {
    return 'transport_error';
  }
  return statusOrError === expectedStatus ? 'success' : 'status_mismatch';
}

/**
 * Arithmetic mean, 0 for an empty array.
 */
export function average(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return sum / values.length;
}

/**
 * Nearest-rank percentile over values already sorted ascending: the value at
 * rank `ceil(size * p / 100)`, with the index clamped to the array. This is
 * the nearest-rank definition, not a floored `size * p / 100` index, so p50 of
 * `[0.1, 0.2, 0.3, 0.4]` is 0.2. Returns 0 for an empty array.
 */
export function percentileOfSorted(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) return 0;
  const index = Math.ceil((sorted.length * p) / 100) - 1;
  return sorted[Math.min(sorted.length - 1, Math.max(0, index))];
}

/**
 * Nearest-rank percentile of unsorted values. See {@link percentileOfSorted}.
 */
export function percentile(values: readonly number[], p: number): number {
  return percentileOfSorted(
    [...values].sort((a, b) => a - b),
    p,
  );
}

/**
 * Aggregates a status code map into standard categories (2xx, 3xx, 4xx, 5xx).
 * @param statusCodeMap A record where keys are status codes and values are their counts.
 */
export function getStatusCodeDistributionByCategory(
  statusCodeMap: Record<number, number>,
): {
  '2xx': number;
  '3xx': number;
  '4xx': number;
  '5xx': number;
  other: number;
} {
  const distribution = {
    '2xx': 0,
    '3xx': 0,
    '4xx': 0,
    '5xx': 0,
    other: 0,
  };

  for (const [codeStr, count] of Object.entries(statusCodeMap)) {
    const category = Math.floor(Number(codeStr) / 100);
    if (category === 2) distribution['2xx'] += count;
    else if (category === 3) distribution['3xx'] += count;
    else if (category === 4) distribution['4xx'] += count;
    else if (category === 5) distribution['5xx'] += count;
    else distribution.other += count;
  }

  return distribution;
}
