import type { ExternalIds } from './case-record.js';

export type ArtifactPurpose = 'completion' | 'submission' | 'diagnostic';

export interface CaptureAttempt {
  strategyName: string;
  succeeded: boolean;
  byteLength: number;
  errorDetail?: string;
}

export interface ArtifactDescriptor {
  logicalName: string;
  recordId: string;
  contentType: string;
  /** true when the artifact must not be shown to the client */
  visibilityFlag: boolean;
  externalIds: ExternalIds;
  strategyName: string;
  payloadBytes: Buffer;
}

export interface ArtifactReference {
  logicalName: string;
  url: string | null;
  hiddenFromClient: boolean;
  purpose: ArtifactPurpose;
}
