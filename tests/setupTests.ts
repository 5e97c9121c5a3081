/* eslint-disable no-console */
// Shared test setup: undici mocking and in-process HTTP clients.
import { getGlobalDispatcher, MockAgent, setGlobalDispatcher } from 'undici';
import { afterEach } from 'vitest';

import type {
  HttpClient,
  HttpRequest,
  HttpResponse,
} from '../src/http-client';
import { sleep } from '../src/utils';

const originalDispatcher = getGlobalDispatcher();

let globalMockAgent: MockAgent | null = null;

afterEach(async () => {
  await cleanupMockAgent();
});

/**
 * Installs a `MockAgent` with real network access disabled as the global
 * dispatcher, for code that calls undici without a dispatcher of its own.
 */
export function createMockAgent(): MockAgent {
  if (globalMockAgent) {
    void globalMockAgent.close();
  }

  globalMockAgent = new MockAgent();
  globalMockAgent.disableNetConnect();
  setGlobalDispatcher(globalMockAgent);

  return globalMockAgent;
}

/**
 * Closes the mock agent, if any, and restores the original dispatcher.
 */
export async function cleanupMockAgent(): Promise<void> {
  if (globalMockAgent) {
    const agent = globalMockAgent;
    globalMockAgent = null;
    try {
      agent.assertNoPendingInterceptors();
    } catch (error) {
      console.warn('Pending interceptors during cleanup:', error);
    }
    await agent.close();
  }
  setGlobalDispatcher(originalDispatcher);
}

export type FakeReply = number | Error;

/**
 * In-process {@link HttpClient}: answers every request after `delayMs` with
 * the reply `respond` picks, and keeps the requests it was sent.
 */
export class FakeHttpClient implements HttpClient {
  readonly requests: HttpRequest[] = [];
  inFlight = 0;
  maxInFlight = 0;
  closed = false;

  constructor(
    private readonly respond: (index: number) => FakeReply = () => 200,
    private readonly delayMs = 0,
  ) {}

  async send(req: HttpRequest): Promise<HttpResponse> {
    const index = this.requests.length;
    this.requests.push(req);
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      await sleep(this.delayMs);
      const reply = this.respond(index);
      if (reply instanceof Error) {
        throw reply;
      }
      return { statusCode: reply, bodyBytes: 0 };
    } finally {
      this.inFlight--;
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
