import { Agent, Dispatcher, request } from 'undici';

import type { HttpMethod } from './config';

/**
 * One request as issued by a worker.
 */
export interface HttpRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
  /** Total time allowed for the request, including reading the body. */
  timeoutMs: number;
}

export interface HttpResponse {
  statusCode: number;
  /** Size of the drained response body. */
  bodyBytes: number;
}

/**
 * Issues HTTP requests for the load generator. `send` resolves once the
 * response body has been fully read, and rejects on transport failures
 * (connection errors, timeouts, DNS failures). Status codes are never treated
 * as failures here.
 */
export interface HttpClient {
  send(req: HttpRequest): Promise<HttpResponse>;
  /** Releases pooled connections. */
  close(): Promise<void>;
}

export interface AgentConfig {
  connections?: number;
  keepAliveTimeout?: number;
  keepAliveMaxTimeout?: number;
}

export interface UndiciHttpClientOptions {
  /**
   * Dispatcher to send requests through, e.g. undici's `MockAgent`. The
   * client does not close a dispatcher it was given.
   */
  dispatcher?: Dispatcher;
  /** Pool settings for the keep-alive agent created when no dispatcher is given. */
  agent?: AgentConfig;
}

/**
 * {@link HttpClient} backed by undici, with a keep-alive connection pool
 * shared by every worker of a run.
 */
export class UndiciHttpClient implements HttpClient {
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;

  constructor(options: UndiciHttpClientOptions = {}) {
    if (options.dispatcher) {
      this.dispatcher = options.dispatcher;
      this.ownsDispatcher = false;
    } else {
      this.dispatcher = new Agent({
        connections: 1024,
        keepAliveTimeout: 4000,
        keepAliveMaxTimeout: 60000,
        ...options.agent,
      });
      this.ownsDispatcher = true;
    }
  }

  async send(req: HttpRequest): Promise<HttpResponse> {
    const { statusCode, body } = await request(req.url, {
      method: req.method,
      headers: req.headers,
      body: req.body,
      dispatcher: this.dispatcher,
      headersTimeout: req.timeoutMs,
      bodyTimeout: req.timeoutMs,
      signal: AbortSignal.timeout(req.timeoutMs),
    });
    // Drain the body so the connection goes back to the pool.
    const bytes = await body.arrayBuffer();
    return { statusCode, bodyBytes: bytes.byteLength };
  }

  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }
}
