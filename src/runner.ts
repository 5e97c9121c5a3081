import { EventEmitter } from 'events';
import { performance } from 'perf_hooks';

import type { LoadTestConfig, RequestSettings } from './config';
import { HTTP_METHODS, resolveRequestSettings } from './config';
import { InvalidConfigurationError } from './errors';
import type { HttpClient } from './http-client';
import { UndiciHttpClient } from './http-client';
import { RateLimiter } from './rate-limiter';
import { OutcomeRecorder } from './recorder';
import { sleep, yieldToEventLoop } from './utils';

export interface RunnerOptions {
  /**
   * Sends the requests. When omitted, each run creates its own
   * {@link UndiciHttpClient} and closes it when the run ends.
   */
  httpClient?: HttpClient;
}

/**
 * State of a single run. Built fresh by every call to {@link Runner.run} so
 * nothing carries over from one run to the next.
 */
interface RunState {
  httpClient: HttpClient;
  limiter: RateLimiter;
  recorder: OutcomeRecorder;
  abortController: AbortController;
  startTime: number;
}

function assertPositive(value: number, name: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidConfigurationError(
      `${name} must be a positive number, received ${value}`,
    );
  }
}

/**
 * Runs a load test: a pool of `concurrency` workers shares one rate limiter
 * and one outcome recorder for `duration` seconds, then the workers are told
 * to stop and the recorder is handed back once every worker has finished its
 * in-flight request.
 *
 * A request that never completes keeps its worker, and so `run()`, from
 * finishing. Requests are bounded by the configured timeout, which the HTTP
 * client enforces.
 *
 * Emits `start` when workers are spawned, `result` for each recorded outcome,
 * and `stop` once the stop signal is raised.
 */
export class Runner extends EventEmitter {
  private readonly config: LoadTestConfig;
  private readonly settings: RequestSettings;
  private readonly httpClient?: HttpClient;
  private state?: RunState;
  private running = false;

  /**
   * @throws InvalidConfigurationError when a setting makes the run impossible.
   */
  constructor(config: LoadTestConfig, options: RunnerOptions = {}) {
    super();

    assertPositive(config.qps, 'qps');
    assertPositive(config.duration, 'duration');
    assertPositive(config.timeout, 'timeout');
    if (!Number.isInteger(config.concurrency) || config.concurrency <= 0) {
      throw new InvalidConfigurationError(
        `concurrency must be a positive integer, received ${config.concurrency}`,
      );
    }
    if (!HTTP_METHODS.some((method) => method === config.method)) {
      throw new InvalidConfigurationError(
        `Unsupported HTTP method: ${config.method}`,
      );
    }

    this.config = config;
    this.settings = resolveRequestSettings(config);
    this.httpClient = options.httpClient;
  }

  /**
   * Number of requests the run would issue at exactly its target rate. Used
   * for progress display; it does not cap the run.
   */
  getTargetRequestCount(): number {
    return Math.round(this.config.qps * this.config.duration);
  }

  /** When the current or last run started (`performance.now()`), 0 before any. */
  getStartTime(): number {
    return this.state?.startTime ?? 0;
  }

  /** The recorder of the current or last run. */
  getRecorder(): OutcomeRecorder | undefined {
    return this.state?.recorder;
  }

  getWorkerCount(): number {
    return this.config.concurrency;
  }

  isStopped(): boolean {
    return this.state?.abortController.signal.aborted ?? false;
  }

  /**
   * Starts the workers, lets them run for the configured duration (or until
   * {@link stop} is called), then waits for all of them to finish.
   * @returns The recorder holding every outcome of this run.
   */
  async run(): Promise<OutcomeRecorder> {
    if (this.running) {
      throw new Error('A run is already in progress');
    }
    this.running = true;

    const state: RunState = {
      httpClient: this.httpClient ?? new UndiciHttpClient(),
      limiter: new RateLimiter(this.config.qps),
      recorder: new OutcomeRecorder(),
      abortController: new AbortController(),
      startTime: performance.now(),
    };
    this.state = state;

    try {
      const workers = Promise.all(
        Array.from({ length: this.config.concurrency }, () =>
          this.runWorker(state),
        ),
      );
      // A worker that throws ends the run early; the error surfaces below.
      workers.catch(() => this.stop());
      this.emit('start');

      await sleep(this.config.duration * 1000, state.abortController.signal);
      this.stop();

      await workers;
      return state.recorder;
    } finally {
      this.running = false;
      if (!this.httpClient) {
        await state.httpClient.close();
      }
    }
  }

  /**
   * Raises the stop signal. Workers finish their in-flight request and exit.
   * Calling it again, or outside a run, has no effect.
   */
  stop(): void {
    const state = this.state;
    if (!state || state.abortController.signal.aborted) return;
    state.abortController.abort();
    this.emit('stop');
  }

  /**
   * One worker: acquire a token, send one request, record the outcome, until
   * the stop signal is raised. Transport failures are recorded, never thrown.
   */
  private async runWorker(state: RunState): Promise<void> {
    const { httpClient, limiter, recorder, abortController } = state;
    const { signal } = abortController;
    const { expectedStatus } = this.settings;

    while (!signal.aborted) {
      await limiter.acquire(signal);
      // The wait for a token is cut short by the stop signal; no request
      // has been issued yet, so there is nothing in flight to finish.
      if (signal.aborted) break;

      const start = performance.now();
      let statusOrError: number | Error;
      try {
        const response = await httpClient.send({
          method: this.settings.method,
          url: this.settings.url,
          headers: this.settings.headers,
          body: this.settings.body,
          timeoutMs: this.settings.timeoutMs,
        });
        statusOrError = response.statusCode;
      } catch (err) {
        statusOrError = err instanceof Error ? err : new Error(String(err));
      }
      const latencySeconds = (performance.now() - start) / 1000;

      const outcome = recorder.record(
        latencySeconds,
        statusOrError,
        expectedStatus,
      );
      this.emit('result', outcome);

      await yieldToEventLoop();
    }
  }
}
