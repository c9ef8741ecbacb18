import type { ArtifactPurpose } from '../types/index.js';

const SUFFIX: Record<ArtifactPurpose, string> = {
  completion: 'CompletionLetter',
  submission: 'Submission',
  diagnostic: 'SubmissionFailure',
};

/** Entity name reduced to word characters and hyphens. */
export function fileSafeName(entityName: string): string {
  const cleaned = entityName.replace(/[^\w-]/g, '');
  return cleaned || 'entity';
}

export function artifactPrefix(recordId: string): string {
  return `cases/${fileSafeName(recordId)}`;
}

/**
 * Storage name of a captured document. Only the primary completion document
 * goes without a strategy suffix.
 */
export function artifactName(
  recordId: string,
  entityName: string,
  purpose: ArtifactPurpose,
  strategyName: string,
  primary: boolean,
): string {
  const base = `${artifactPrefix(recordId)}/${fileSafeName(entityName)}-${SUFFIX[purpose]}`;
  return primary ? `${base}.pdf` : `${base}-${strategyName}.pdf`;
}

export function structuredLogName(recordId: string): string {
  return `${artifactPrefix(recordId)}/Payload.json`;
}

export function diagnosticLogName(recordId: string, timestamp: Date): string {
  const stamp = timestamp.toISOString().replace(/[:.]/g, '-');
  return `logs/${fileSafeName(recordId)}/run-${stamp}.md`;
}
