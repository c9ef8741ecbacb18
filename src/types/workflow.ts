import type { ArtifactReference, CaptureAttempt } from './capture.js';

export type WorkflowState =
  | 'Start'
  | 'EntityClassification'
  | 'SubTypeSelection'
  | 'ResponsiblePartyDetails'
  | 'AddressDetails'
  | 'BusinessDetails'
  | 'ActivityDetails'
  | 'Review'
  | 'Confirmation'
  | 'Success'
  | 'Failure';

export type ClassificationKind = 'None' | 'TerminalRejection' | 'ValidationError' | 'Unknown';

export interface FailureClassification {
  kind: ClassificationKind;
  /** reference code the site printed, when one was found */
  code: string | null;
  message: string | null;
}

export interface RunResult {
  runId: string;
  success: boolean;
  completionNumber: string | null;
  artifactReferences: ArtifactReference[];
  classification: FailureClassification;
  finalState: WorkflowState;
  captureAttempts: CaptureAttempt[];
  durationMs: number;
}
