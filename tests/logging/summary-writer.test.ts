import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { buildSummaryMarkdown, writeSummary } from '../../src/logging/summary-writer.js';
import type { RunResult } from '../../src/types/index.js';
import { readFile, rm, mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

function makeResult(overrides: Partial<RunResult> = {}): RunResult {
  return {
    runId: 'run-1',
    success: true,
    completionNumber: '12-3456789',
    artifactReferences: [
      {
        logicalName: 'cases/case-1/AcmeLLC-CompletionLetter.pdf',
        url: 'https://storage.example.test/a.pdf',
        hiddenFromClient: false,
        purpose: 'completion',
      },
    ],
    classification: { kind: 'None', code: null, message: null },
    finalState: 'Success',
    captureAttempts: [
      { strategyName: 'download', succeeded: false, byteLength: 0, errorDetail: 'no completed download within 500ms' },
      { strategyName: 'print', succeeded: true, byteLength: 2048 },
    ],
    durationMs: 125_000,
    ...overrides,
  };
}

const startedAt = new Date('2026-10-19T08:00:00.000Z');

describe('buildSummaryMarkdown', () => {
  it('lists the outcome, attempts and artifacts', () => {
    const md = buildSummaryMarkdown({
      result: makeResult(),
      recordId: 'case-1',
      entityName: 'Acme LLC',
      startedAt,
      structuredLog: { completionNumber: '12-3456789' },
    });
    const lines = md.split('\n');

    expect(lines[0]).toBe('# Run Summary');
    expect(lines).toContain('- Record: case-1 (Acme LLC)');
    expect(lines).toContain('- Result: Success');
    expect(lines).toContain('- Duration: 02m 05s');
    expect(lines).toContain('- Completion number: 12-3456789');
    expect(lines).toContain('1. download: failed - no completed download within 500ms');
    expect(lines).toContain('2. print: ok, 2048 bytes');
    expect(lines).toContain(
      '- cases/case-1/AcmeLLC-CompletionLetter.pdf (completion, visible): https://storage.example.test/a.pdf',
    );
    expect(lines).toContain('- Started at: 2026-10-19T08:00:00.000Z');
    expect(lines).toContain('- completionNumber: 12-3456789');
  });

  it('shows the failure classification and empty sections', () => {
    const md = buildSummaryMarkdown({
      result: makeResult({
        success: false,
        completionNumber: null,
        artifactReferences: [],
        captureAttempts: [],
        finalState: 'Failure',
        classification: { kind: 'TerminalRejection', code: '101', message: null },
      }),
      recordId: 'case-1',
      entityName: 'Acme LLC',
      startedAt,
      structuredLog: {},
    });

    expect(md).toContain('## Classification\n- Kind: TerminalRejection\n- Code: 101\n\n## Capture Attempts\n- None\n');
    expect(md).toContain('## Artifacts\n- None\n');
    expect(md).toContain('- Completion number: none');
    expect(md).not.toContain('## Structured Log');
  });
});

describe('writeSummary', () => {
  let runDir: string;

  beforeEach(async () => {
    runDir = join(tmpdir(), `summary-test-${randomUUID()}`);
    await mkdir(runDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(runDir, { recursive: true, force: true });
  });

  it('writes summary.md and returns the same text', async () => {
    const md = await writeSummary({
      runDir,
      result: makeResult(),
      recordId: 'case-1',
      entityName: 'Acme LLC',
      startedAt,
      structuredLog: {},
    });
    expect(await readFile(join(runDir, 'summary.md'), 'utf-8')).toBe(md);
  });
});
