import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { HttpClient } from './http-client.js';
import type { ArtifactVisibility, NotificationGateway, StructuredLog } from './types.js';

const AckSchema = z.object({}).passthrough();

function casePath(recordId: string, leaf: string): string {
  return `/cases/${encodeURIComponent(recordId)}/${leaf}`;
}

/** Case-status updates posted to the system of record's REST API. */
export class HttpNotificationGateway implements NotificationGateway {
  constructor(private client: HttpClient) {}

  async notifySuccess(recordId: string, completionNumber: string): Promise<void> {
    await this.client.post(
      casePath(recordId, 'status'),
      { status: 'success', completionNumber },
      randomUUID(),
      AckSchema,
    );
  }

  async notifyFailure(recordId: string, code: string, status: 'fail', diagnosticContext: StructuredLog): Promise<void> {
    await this.client.post(
      casePath(recordId, 'status'),
      { status, code, context: diagnosticContext },
      randomUUID(),
      AckSchema,
    );
  }

  async notifyArtifactAvailable(recordId: string, url: string, visibility: ArtifactVisibility): Promise<void> {
    await this.client.post(
      casePath(recordId, 'artifacts'),
      { url, ...visibility },
      randomUUID(),
      AckSchema,
    );
  }
}
