import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { RunResult } from '../types/index.js';
import type { StructuredLog } from '../gateways/types.js';

export interface SummaryOptions {
  runDir: string;
  result: RunResult;
  recordId: string;
  entityName: string;
  startedAt: Date;
  structuredLog: StructuredLog;
}

/** Write `summary.md` to the run directory and return its text. */
export async function writeSummary(options: SummaryOptions): Promise<string> {
  const md = buildSummaryMarkdown(options);
  await writeFile(join(options.runDir, 'summary.md'), md, 'utf-8');
  return md;
}

export function buildSummaryMarkdown(options: Omit<SummaryOptions, 'runDir'>): string {
  const { result, recordId, entityName, startedAt, structuredLog } = options;
  const { classification } = result;

  const lines: string[] = [
    '# Run Summary',
    `- Record: ${recordId} (${entityName})`,
    `- Result: ${result.success ? 'Success' : 'Failure'}`,
    `- Final state: ${result.finalState}`,
    `- Duration: ${formatDuration(result.durationMs)}`,
    `- Completion number: ${result.completionNumber ?? 'none'}`,
    '',
    '## Classification',
    `- Kind: ${classification.kind}`,
  ];
  if (classification.code) lines.push(`- Code: ${classification.code}`);
  if (classification.message) lines.push(`- Message: ${classification.message}`);

  lines.push('');
  lines.push('## Capture Attempts');
  if (result.captureAttempts.length === 0) {
    lines.push('- None');
  }
  let attemptNum = 1;
  for (const attempt of result.captureAttempts) {
    const outcome = attempt.succeeded
      ? `ok, ${attempt.byteLength} bytes`
      : `failed - ${attempt.errorDetail ?? 'no details'}`;
    lines.push(`${attemptNum}. ${attempt.strategyName}: ${outcome}`);
    attemptNum++;
  }

  lines.push('');
  lines.push('## Artifacts');
  if (result.artifactReferences.length === 0) {
    lines.push('- None');
  }
  for (const ref of result.artifactReferences) {
    const visibility = ref.hiddenFromClient ? 'hidden' : 'visible';
    lines.push(`- ${ref.logicalName} (${ref.purpose}, ${visibility}): ${ref.url ?? 'not stored'}`);
  }

  lines.push('');
  lines.push('## Run Info');
  lines.push(`- Run ID: ${result.runId}`);
  lines.push(`- Started at: ${startedAt.toISOString()}`);

  const entries = Object.entries(structuredLog);
  if (entries.length > 0) {
    lines.push('');
    lines.push('## Structured Log');
    for (const [key, value] of entries) {
      lines.push(`- ${key}: ${String(value)}`);
    }
  }

  return lines.join('\n') + '\n';
}

function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${String(minutes).padStart(2, '0')}m ${String(seconds).padStart(2, '0')}s`;
}
