import { promises as fs } from 'fs';
import path from 'path';
import { request } from 'undici';
import { z } from 'zod';

import { InvalidConfigurationError } from './errors';

/** HTTP methods a load test can issue. */
export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'DELETE'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

/** Methods whose requests carry the payload as a body. */
const BODY_METHODS: ReadonlySet<HttpMethod> = new Set(['POST', 'PUT']);

/** Headers sent when the configuration gives none. */
export const DEFAULT_HEADERS: Readonly<Record<string, string>> = {
  'Content-Type': 'application/json',
};

/** Body sent by POST and PUT requests when the configuration gives none. */
export const DEFAULT_PAYLOAD: Readonly<Record<string, string>> = {
  example_key: 'example_value',
};

/**
 * Zod schema for a load test configuration.
 */
export const LoadTestConfigSchema = z.object({
  /** A URL to the JSON schema for this configuration file. */
  $schema: z.string().optional(),
  /** The URL to load test. */
  url: z
    .string()
    .min(1, 'URL cannot be empty')
    .url('Invalid URL format')
    .refine((url) => url.startsWith('http://') || url.startsWith('https://'), {
      message: 'URL must start with http:// or https://',
    }),
  /** The HTTP method to use. Defaults to GET. */
  method: z
    .preprocess(
      (val) => (typeof val === 'string' ? val.toUpperCase() : val),
      z.enum(HTTP_METHODS),
    )
    .default('GET'),
  /** Target requests per second across all workers. */
  qps: z.number().positive('qps must be positive'),
  /** Duration of the test in seconds. */
  duration: z.number().positive('duration must be positive').default(60),
  /** Number of concurrent workers. */
  concurrency: z
    .number()
    .int('concurrency must be an integer')
    .positive('concurrency must be positive')
    .default(1),
  /** Timeout for each request in seconds. */
  timeout: z.number().positive('timeout must be positive').default(5),
  /** Headers sent with every request. */
  headers: z.record(z.string(), z.string()).optional(),
  /** Bearer token, sent as an `Authorization` header. */
  auth: z.string().min(1, 'auth token cannot be empty').optional(),
  /** Request body for POST and PUT. Objects and arrays are sent as JSON. */
  payload: z
    .record(z.string(), z.unknown())
    .or(z.array(z.unknown()))
    .or(z.string())
    .optional(),
  /** The status code that counts as a successful response. */
  expectedStatus: z.number().int().min(100).max(599).default(200),
  /** File to write the JSON summary report to. */
  output: z.string().min(1, 'Output path cannot be empty').optional(),
  /** Export a comprehensive report to a directory with this base name. */
  export: z.string().min(1, 'Export path cannot be empty').optional(),
  /** Print the JSON summary report to stdout. */
  verbose: z.boolean().default(false),
});

/**
 * A validated configuration, with defaults applied.
 */
export type LoadTestConfig = z.infer<typeof LoadTestConfigSchema>;

/**
 * A configuration as written by a user, before defaults are applied.
 */
export type LoadTestConfigInput = z.input<typeof LoadTestConfigSchema>;

/**
 * Everything a worker needs to issue one request, derived once per run.
 */
export interface RequestSettings {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
  timeoutMs: number;
  expectedStatus: number;
}

/**
 * Validates a configuration object.
 * @throws InvalidConfigurationError listing every schema issue.
 */
export function parseConfig(input: unknown): LoadTestConfig {
  const parsed = LoadTestConfigSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new InvalidConfigurationError(
      `Invalid configuration: ${details}`,
      parsed.error.issues,
    );
  }
  return parsed.data;
}

/**
 * Reads a JSON configuration document from a local file or a remote URL,
 * without validating it.
 * @throws Error when the remote server answers with a status of 400 or above.
 */
export async function readRawConfig(source: string): Promise<unknown> {
  if (source.startsWith('http://') || source.startsWith('https://')) {
    const { statusCode, body } = await request(source);
    if (statusCode >= 400) {
      await body.dump();
      throw new Error(`Remote config fetch failed: ${statusCode}`);
    }
    return body.json();
  }
  const fileContent = await fs.readFile(path.resolve(source), 'utf-8');
  return JSON.parse(fileContent);
}

/**
 * Loads and validates a configuration from a file, URL, or direct object.
 * @param configInput The path to a local JSON file, a URL to a remote one, or a config object.
 */
export async function loadConfig(
  configInput: string | LoadTestConfigInput,
): Promise<LoadTestConfig> {
  if (typeof configInput === 'object') {
    return parseConfig(configInput);
  }
  return parseConfig(await readRawConfig(configInput));
}

/**
 * Derives the per-request settings of a run: default headers when none are
 * configured, the bearer token, and a body for POST and PUT only.
 */
export function resolveRequestSettings(config: LoadTestConfig): RequestSettings {
  const headers: Record<string, string> = { ...config.headers };
  if (config.auth) {
    headers['Authorization'] = `Bearer ${config.auth}`;
  }

  let body: string | undefined;
  if (BODY_METHODS.has(config.method)) {
    const payload = config.payload ?? DEFAULT_PAYLOAD;
    body = typeof payload === 'string' ? payload : JSON.stringify(payload);
  }

  return {
    method: config.method,
    url: config.url,
    headers: Object.keys(headers).length > 0 ? headers : { ...DEFAULT_HEADERS },
    body,
    timeoutMs: config.timeout * 1000,
    expectedStatus: config.expectedStatus,
  };
}
