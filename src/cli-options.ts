import { InvalidArgumentError } from 'commander';

import { InvalidConfigurationError } from './errors';

/**
 * Options as commander hands them to the main action.
 */
export interface CliOptions {
  config?: string;
  qps?: number;
  duration?: number;
  concurrency?: number;
  timeout?: number;
  method?: string;
  headers?: string[];
  payload?: string;
  expectedStatus?: number;
  auth?: string;
  output?: string;
  export?: string;
  verbose?: boolean;
  quiet?: boolean;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Commander argument parser for numeric flags.
 */
export function parseNumberOption(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new InvalidArgumentError('Not a number.');
  }
  return parsed;
}

/**
 * Parses `key:value` header flags. Each is split at its first colon and both
 * sides are trimmed, so values may themselves contain colons.
 * @throws InvalidConfigurationError for a header without a colon or a name.
 */
export function parseHeaders(values: readonly string[]): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const value of values) {
    const separator = value.indexOf(':');
    const name = separator === -1 ? '' : value.slice(0, separator).trim();
    if (!name) {
      throw new InvalidConfigurationError(
        `Invalid header "${value}", expected key:value`,
      );
    }
    headers[name] = value.slice(separator + 1).trim();
  }
  return headers;
}

/**
 * Parses a payload flag as JSON. Anything that is not a JSON object or array
 * is sent as the raw string.
 */
export function parsePayload(value: string): unknown {
  try {
    const parsed: unknown = JSON.parse(value);
    return typeof parsed === 'object' && parsed !== null ? parsed : value;
  } catch {
    return value;
  }
}

/**
 * Layers the command-line flags over a configuration read from a file.
 * Headers are merged, with flags winning on a clash.
 * @param url The positional URL argument, if any.
 * @param opts The parsed flags.
 * @param base The raw configuration file contents, if one was read.
 * @returns A raw configuration, still to be validated.
 */
export function buildConfigInput(
  url: string | undefined,
  opts: CliOptions,
  base: unknown = {},
): Record<string, unknown> {
  if (!isRecord(base)) {
    throw new InvalidConfigurationError(
      'Invalid configuration: (root): Expected a JSON object',
    );
  }

  const merged: Record<string, unknown> = { ...base };
  const overrides: Record<string, unknown> = {
    url,
    qps: opts.qps,
    duration: opts.duration,
    concurrency: opts.concurrency,
    timeout: opts.timeout,
    method: opts.method,
    expectedStatus: opts.expectedStatus,
    auth: opts.auth,
    output: opts.output,
    export: opts.export,
    verbose: opts.verbose,
  };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }

  if (opts.headers && opts.headers.length > 0) {
    merged.headers = {
      ...(isRecord(base.headers) ? base.headers : {}),
      ...parseHeaders(opts.headers),
    };
  }
  if (opts.payload !== undefined) {
    merged.payload = parsePayload(opts.payload);
  }

  return merged;
}
