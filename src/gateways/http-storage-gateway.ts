import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { ExternalIds } from '../types/index.js';
import { diagnosticLogName, structuredLogName } from '../capture/artifact-naming.js';
import { PersistenceFailure } from '../exception/errors.js';
import { HttpClientError, type HttpClient, type RequestOptions } from './http-client.js';
import type { ObjectStorageGateway, StructuredLog } from './types.js';

const StoredObjectSchema = z.object({ url: z.string().min(1) });
type StoredObject = z.infer<typeof StoredObjectSchema>;

function objectPath(logicalName: string): string {
  return `/objects/${logicalName.split('/').map(encodeURIComponent).join('/')}`;
}

/** Object storage over a plain HTTP PUT API; metadata travels as headers. */
export class HttpObjectStorageGateway implements ObjectStorageGateway {
  constructor(
    private client: HttpClient,
    private now: () => Date = () => new Date(),
  ) {}

  async uploadArtifact(
    bytes: Buffer,
    logicalName: string,
    contentType: string,
    visibilityFlag: boolean,
    externalIds: ExternalIds,
  ): Promise<string> {
    const headers: Record<string, string> = {
      'X-Meta-Hidden-From-Client': String(visibilityFlag),
    };
    if (externalIds.accountId) headers['X-Meta-Account-Id'] = externalIds.accountId;
    if (externalIds.entityId) headers['X-Meta-Entity-Id'] = externalIds.entityId;
    if (externalIds.caseId) headers['X-Meta-Case-Id'] = externalIds.caseId;

    const response = await this.put(logicalName, {
      method: 'PUT',
      path: objectPath(logicalName),
      body: bytes,
      contentType,
      headers,
      requestId: randomUUID(),
      schema: StoredObjectSchema,
    });
    return response.url;
  }

  async uploadStructuredLog(recordId: string, log: StructuredLog): Promise<boolean> {
    const logicalName = structuredLogName(recordId);
    await this.put(logicalName, {
      method: 'PUT',
      path: objectPath(logicalName),
      body: log,
      requestId: randomUUID(),
      schema: StoredObjectSchema,
    });
    return true;
  }

  async uploadDiagnosticLog(recordId: string, text: Buffer): Promise<string | null> {
    if (text.length === 0) return null;
    const logicalName = diagnosticLogName(recordId, this.now());
    const response = await this.put(logicalName, {
      method: 'PUT',
      path: objectPath(logicalName),
      body: text,
      contentType: 'text/markdown; charset=utf-8',
      requestId: randomUUID(),
      schema: StoredObjectSchema,
    });
    return response.url;
  }

  private async put(
    logicalName: string,
    options: RequestOptions<StoredObject>,
  ): Promise<StoredObject> {
    try {
      return (await this.client.request(options)).data;
    } catch (error) {
      if (error instanceof HttpClientError) {
        throw new PersistenceFailure(`upload of ${logicalName} failed: ${error.message}`, logicalName);
      }
      throw error;
    }
  }
}
