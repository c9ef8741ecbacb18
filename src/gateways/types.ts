import type { ArtifactPurpose, ExternalIds } from '../types/index.js';

export type StructuredLogValue = string | number | boolean | null;
export type StructuredLog = Record<string, StructuredLogValue>;

export interface ArtifactVisibility {
  hiddenFromClient: boolean;
  purpose: ArtifactPurpose;
  logicalName: string;
}

/** Durable storage for captured documents and run logs. */
export interface ObjectStorageGateway {
  /** Returns the URL the stored object can be fetched from. */
  uploadArtifact(
    bytes: Buffer,
    logicalName: string,
    contentType: string,
    visibilityFlag: boolean,
    externalIds: ExternalIds,
  ): Promise<string>;
  uploadStructuredLog(recordId: string, log: StructuredLog): Promise<boolean>;
  uploadDiagnosticLog(recordId: string, text: Buffer): Promise<string | null>;
}

/** Status updates for the system of record. Callers treat every call as best effort. */
export interface NotificationGateway {
  notifySuccess(recordId: string, completionNumber: string): Promise<void>;
  notifyFailure(recordId: string, code: string, status: 'fail', diagnosticContext: StructuredLog): Promise<void>;
  notifyArtifactAvailable(recordId: string, url: string, visibility: ArtifactVisibility): Promise<void>;
}
