import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HttpClient } from '../../src/gateways/http-client.js';
import { HttpObjectStorageGateway } from '../../src/gateways/http-storage-gateway.js';
import { HttpNotificationGateway } from '../../src/gateways/http-notification-gateway.js';
import { PersistenceFailure } from '../../src/exception/errors.js';

describe('HTTP gateways', () => {
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
      text: () => Promise.resolve(JSON.stringify(body)),
    });
    globalThis.fetch = fetchMock;
    return fetchMock;
  }

  const client = () => new HttpClient({ baseUrl: 'https://records.example.test' });

  describe('HttpObjectStorageGateway', () => {
    it('puts the artifact with its metadata headers', async () => {
      const fetchMock = mockFetch(200, { url: 'https://cdn.example.test/a.pdf' });
      const storage = new HttpObjectStorageGateway(client());

      const url = await storage.uploadArtifact(
        Buffer.from('%PDF'),
        'cases/c-1/Acme LLC-CompletionLetter.pdf',
        'application/pdf',
        false,
        { accountId: 'acct-1', caseId: 'crm-1' },
      );

      expect(url).toBe('https://cdn.example.test/a.pdf');
      const [target, init] = fetchMock.mock.calls[0];
      expect(target).toBe('https://records.example.test/objects/cases/c-1/Acme%20LLC-CompletionLetter.pdf');
      expect(init.method).toBe('PUT');
      expect(init.headers).toMatchObject({
        'Content-Type': 'application/pdf',
        'X-Meta-Hidden-From-Client': 'false',
        'X-Meta-Account-Id': 'acct-1',
        'X-Meta-Case-Id': 'crm-1',
      });
      expect(init.headers['X-Meta-Entity-Id']).toBeUndefined();
    });

    it('stores the structured log as JSON under the case prefix', async () => {
      const fetchMock = mockFetch(200, { url: 'https://cdn.example.test/p.json' });
      const storage = new HttpObjectStorageGateway(client());

      expect(await storage.uploadStructuredLog('c-1', { completionNumber: '12-3456789' })).toBe(true);
      const [target, init] = fetchMock.mock.calls[0];
      expect(target).toBe('https://records.example.test/objects/cases/c-1/Payload.json');
      expect(init.body).toBe('{"completionNumber":"12-3456789"}');
    });

    it('names the diagnostic log by timestamp and skips empty text', async () => {
      const fetchMock = mockFetch(200, { url: 'https://cdn.example.test/run.md' });
      const storage = new HttpObjectStorageGateway(client(), () => new Date('2026-10-19T08:30:00.000Z'));

      expect(await storage.uploadDiagnosticLog('c-1', Buffer.alloc(0))).toBeNull();
      expect(fetchMock).not.toHaveBeenCalled();

      expect(await storage.uploadDiagnosticLog('c-1', Buffer.from('# Run Summary'))).toBe('https://cdn.example.test/run.md');
      expect(fetchMock.mock.calls[0][0]).toBe(
        'https://records.example.test/objects/logs/c-1/run-2026-10-19T08-30-00-000Z.md',
      );
    });

    it('turns HTTP errors into PersistenceFailure', async () => {
      mockFetch(500, {}, false);
      const storage = new HttpObjectStorageGateway(client());

      await expect(
        storage.uploadArtifact(Buffer.from('x'), 'cases/c-1/a.pdf', 'application/pdf', true, {}),
      ).rejects.toBeInstanceOf(PersistenceFailure);
    });
  });

  describe('HttpNotificationGateway', () => {
    it('posts success to the case status endpoint', async () => {
      const fetchMock = mockFetch(200, {});
      await new HttpNotificationGateway(client()).notifySuccess('c 1', '12-3456789');

      const [target, init] = fetchMock.mock.calls[0];
      expect(target).toBe('https://records.example.test/cases/c%201/status');
      expect(JSON.parse(init.body)).toEqual({ status: 'success', completionNumber: '12-3456789' });
    });

    it('posts failure with its diagnostic context', async () => {
      const fetchMock = mockFetch(200, {});
      await new HttpNotificationGateway(client()).notifyFailure('c-1', '101', 'fail', { classification: 'TerminalRejection' });

      expect(JSON.parse(fetchMock.mock.calls[0][1].body)).toEqual({
        status: 'fail',
        code: '101',
        context: { classification: 'TerminalRejection' },
      });
    });

    it('posts artifact availability with its visibility', async () => {
      const fetchMock = mockFetch(200, {});
      await new HttpNotificationGateway(client()).notifyArtifactAvailable('c-1', 'https://cdn.example.test/a.pdf', {
        hiddenFromClient: true,
        purpose: 'diagnostic',
        logicalName: 'cases/c-1/Acme-SubmissionFailure.pdf',
      });

      const [target, init] = fetchMock.mock.calls[0];
      expect(target).toBe('https://records.example.test/cases/c-1/artifacts');
      expect(JSON.parse(init.body)).toEqual({
        url: 'https://cdn.example.test/a.pdf',
        hiddenFromClient: true,
        purpose: 'diagnostic',
        logicalName: 'cases/c-1/Acme-SubmissionFailure.pdf',
      });
    });
  });
});
