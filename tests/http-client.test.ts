import { MockAgent } from 'undici';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { UndiciHttpClient } from '../src/http-client';

describe('UndiciHttpClient', () => {
  let mockAgent: MockAgent;

  beforeEach(() => {
    mockAgent = new MockAgent();
    mockAgent.disableNetConnect();
  });

  afterEach(async () => {
    mockAgent.assertNoPendingInterceptors();
    await mockAgent.close();
  });

  const request = {
    method: 'GET' as const,
    url: 'http://localhost:8080/health',
    headers: { 'Content-Type': 'application/json' },
    timeoutMs: 1000,
  };

  it('should resolve with the status code and drained body size', async () => {
    mockAgent
      .get('http://localhost:8080')
      .intercept({ path: '/health', method: 'GET' })
      .reply(200, 'healthy');
    const client = new UndiciHttpClient({ dispatcher: mockAgent });

    await expect(client.send(request)).resolves.toEqual({
      statusCode: 200,
      bodyBytes: 7,
    });
  });

  it('should resolve, not reject, on error status codes', async () => {
    mockAgent
      .get('http://localhost:8080')
      .intercept({ path: '/health', method: 'GET' })
      .reply(503, '');
    const client = new UndiciHttpClient({ dispatcher: mockAgent });

    const response = await client.send(request);
    expect(response.statusCode).toBe(503);
  });

  it('should send the method, headers and body', async () => {
    mockAgent
      .get('http://localhost:8080')
      .intercept({
        path: '/items',
        method: 'POST',
        headers: { authorization: 'Bearer test-token' },
        body: '{"name":"item"}',
      })
      .reply(201, '');
    const client = new UndiciHttpClient({ dispatcher: mockAgent });

    const response = await client.send({
      method: 'POST',
      url: 'http://localhost:8080/items',
      headers: { Authorization: 'Bearer test-token' },
      body: '{"name":"item"}',
      timeoutMs: 1000,
    });
    expect(response.statusCode).toBe(201);
  });

  it('should reject on transport errors', async () => {
    mockAgent
      .get('http://localhost:8080')
      .intercept({ path: '/health', method: 'GET' })
      .replyWithError(new Error('connect ECONNREFUSED'));
    const client = new UndiciHttpClient({ dispatcher: mockAgent });

    await expect(client.send(request)).rejects.toThrow('connect ECONNREFUSED');
  });

  it('should reject when the response takes longer than the timeout', async () => {
    mockAgent
      .get('http://localhost:8080')
      .intercept({ path: '/health', method: 'GET' })
      .reply(200, 'late')
      .delay(500);
    const client = new UndiciHttpClient({ dispatcher: mockAgent });

    await expect(client.send({ ...request, timeoutMs: 50 })).rejects.toThrow();
  });

  it('should leave an injected dispatcher open on close', async () => {
    const client = new UndiciHttpClient({ dispatcher: mockAgent });
    await client.close();

    mockAgent
      .get('http://localhost:8080')
      .intercept({ path: '/health', method: 'GET' })
      .reply(200, '');
    const again = new UndiciHttpClient({ dispatcher: mockAgent });
    await expect(again.send(request)).resolves.toEqual({
      statusCode: 200,
      bodyBytes: 0,
    });
  });
});
