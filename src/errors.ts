import type { ZodIssue } from 'zod';

/**
 * Raised when a load test is configured with values it cannot run with
 * (non-positive rate, duration, concurrency or timeout, unsupported method,
 * malformed header). Always thrown before any worker is started.
 */
export class InvalidConfigurationError extends Error {
  /** Schema validation issues, when the error comes from config parsing. */
  readonly issues: ZodIssue[];

  constructor(message: string, issues: ZodIssue[] = []) {
    super(message);
    this.name = 'InvalidConfigurationError';
    this.issues = issues;
  }
}
