import type { ArtifactDescriptor, ArtifactPurpose, ArtifactReference } from '../types/index.js';
import type { NotificationGateway, ObjectStorageGateway, StructuredLog } from '../gateways/types.js';
import type { EventLogger } from '../logging/run-logger.js';
import { errorMessage } from '../utils/timing.js';

/**
 * Upload captured documents and announce the stored ones. A failed upload
 * leaves a reference without URL; it never fails the run.
 */
export class ArtifactPublisher {
  constructor(
    private storage: ObjectStorageGateway,
    private notifier: NotificationGateway,
    private logger: EventLogger,
  ) {}

  async publish(descriptors: ArtifactDescriptor[], purpose: ArtifactPurpose): Promise<ArtifactReference[]> {
    const references: ArtifactReference[] = [];
    for (const descriptor of descriptors) {
      let url: string | null = null;
      try {
        url = await this.storage.uploadArtifact(
          descriptor.payloadBytes,
          descriptor.logicalName,
          descriptor.contentType,
          descriptor.visibilityFlag,
          descriptor.externalIds,
        );
        await this.logger.log('info', 'artifact_uploaded', { logicalName: descriptor.logicalName, url });
      } catch (error) {
        await this.logger.log('error', 'artifact_upload_failed', {
          logicalName: descriptor.logicalName,
          error: errorMessage(error),
        });
      }

      references.push({
        logicalName: descriptor.logicalName,
        url,
        hiddenFromClient: descriptor.visibilityFlag,
        purpose,
      });

      if (url) {
        await this.notifier.notifyArtifactAvailable(descriptor.recordId, url, {
          hiddenFromClient: descriptor.visibilityFlag,
          purpose,
          logicalName: descriptor.logicalName,
        });
      }
    }
    return references;
  }

  async publishStructuredLog(recordId: string, log: StructuredLog): Promise<boolean> {
    try {
      return await this.storage.uploadStructuredLog(recordId, log);
    } catch (error) {
      await this.logger.log('error', 'structured_log_upload_failed', { error: errorMessage(error) });
      return false;
    }
  }

  async publishDiagnosticLog(recordId: string, text: string): Promise<ArtifactReference | null> {
    try {
      const url = await this.storage.uploadDiagnosticLog(recordId, Buffer.from(text, 'utf-8'));
      if (!url) return null;
      return { logicalName: 'summary.md', url, hiddenFromClient: true, purpose: 'diagnostic' };
    } catch (error) {
      await this.logger.log('error', 'diagnostic_log_upload_failed', { error: errorMessage(error) });
      return null;
    }
  }
}
