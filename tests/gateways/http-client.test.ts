import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { z } from 'zod';
import { HttpClient, HttpClientError } from '../../src/gateways/http-client.js';

const Ack = z.object({ ok: z.boolean() });

describe('HttpClient', () => {
  let originalFetch: typeof globalThis.fetch;

  beforeEach(() => {
    originalFetch = globalThis.fetch;
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  function mockFetch(status: number, body: unknown, ok = true) {
    const fetchMock = vi.fn().mockResolvedValue({
      ok,
      status,
      statusText: ok ? 'OK' : 'Error',
      text: () => Promise.resolve(body === undefined ? '' : JSON.stringify(body)),
    });
    globalThis.fetch = fetchMock;
    return fetchMock;
  }

  it('sends JSON with the request id and bearer token', async () => {
    mockFetch(200, { ok: true });
    const client = new HttpClient({ baseUrl: 'http://localhost:8000/', apiKey: 'test-key' });
    const body = { status: 'success', completionNumber: '12-3456789' };

    await client.post('/cases/c1/status', body, 'req-1', Ack);

    expect(globalThis.fetch).toHaveBeenCalledWith(
      'http://localhost:8000/cases/c1/status',
      expect.objectContaining({
        method: 'POST',
        body: JSON.stringify(body),
        headers: expect.objectContaining({
          'Content-Type': 'application/json',
          'X-Request-Id': 'req-1',
          'Authorization': 'Bearer test-key',
        }),
      }),
    );
  });

  it('sends buffers as raw bytes', async () => {
    const fetchMock = mockFetch(200, { ok: true });
    const client = new HttpClient({ baseUrl: 'http://localhost:8000' });

    await client.put('/objects/a.pdf', Buffer.from('%PDF'), 'req-2', Ack);

    const init = fetchMock.mock.calls[0][1];
    expect(init.headers['Content-Type']).toBe('application/octet-stream');
    expect(Buffer.from(init.body).toString()).toBe('%PDF');
  });

  it('validates the response body', async () => {
    mockFetch(200, { ok: true });
    const client = new HttpClient({ baseUrl: 'http://localhost:8000' });

    const response = await client.post('/x', {}, 'req-3', Ack);

    expect(response).toEqual({ ok: true, status: 200, data: { ok: true }, requestId: 'req-3' });
  });

  it('treats an empty body as an empty object', async () => {
    mockFetch(204, undefined);
    const client = new HttpClient({ baseUrl: 'http://localhost:8000' });

    const response = await client.post('/x', {}, 'req-4', z.object({}).passthrough());

    expect(response.data).toEqual({});
  });

  it('throws HttpClientError on a non-2xx response', async () => {
    mockFetch(503, { error: 'down' }, false);
    const client = new HttpClient({ baseUrl: 'http://localhost:8000' });

    await expect(client.post('/x', {}, 'req-5', Ack)).rejects.toMatchObject({
      name: 'HttpClientError',
      status: 503,
      requestId: 'req-5',
    });
  });

  it('wraps a schema mismatch as HttpClientError', async () => {
    mockFetch(200, { ok: 'yes' });
    const client = new HttpClient({ baseUrl: 'http://localhost:8000' });

    await expect(client.post('/x', {}, 'req-6', Ack)).rejects.toBeInstanceOf(HttpClientError);
  });

  it('reports an abort as a timeout', async () => {
    const abort = new Error('The operation was aborted');
    abort.name = 'AbortError';
    globalThis.fetch = vi.fn().mockRejectedValue(abort);
    const client = new HttpClient({ baseUrl: 'http://localhost:8000', defaultTimeoutMs: 50 });

    await expect(client.post('/x', {}, 'req-7', Ack)).rejects.toThrow('Request timed out after 50ms');
  });
});
