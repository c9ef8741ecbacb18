import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { RunLogger, type LogEntry } from '../../src/logging/run-logger.js';
import { readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

describe('RunLogger', () => {
  let runDir: string;
  let logger: RunLogger;

  beforeEach(() => {
    runDir = join(tmpdir(), `run-logger-test-${randomUUID()}`);
    logger = new RunLogger(runDir, 'run-1');
  });

  afterEach(async () => {
    await rm(runDir, { recursive: true, force: true });
  });

  describe('log', () => {
    it('creates the run directory and logs.jsonl', async () => {
      await logger.info('state_entered', { state: 'Start' });
      const content = await readFile(join(runDir, 'logs.jsonl'), 'utf-8');
      const lines = content.trim().split('\n');
      expect(lines).toHaveLength(1);
      const entry = JSON.parse(lines[0]);
      expect(entry.event).toBe('state_entered');
      expect(entry.level).toBe('info');
      expect(entry.runId).toBe('run-1');
      expect(entry.state).toBe('Start');
      expect(entry.timestamp).toBeDefined();
    });

    it('appends entries in order', async () => {
      await logger.warn('radio_failed', { target: 'Entity category' });
      await logger.error('run_failed', { error: 'browser closed' });
      const lines = (await readFile(join(runDir, 'logs.jsonl'), 'utf-8')).trim().split('\n');
      expect(lines.map((line) => JSON.parse(line).event)).toEqual(['radio_failed', 'run_failed']);
    });

    it('does not let data overwrite the reserved fields', async () => {
      await logger.log('debug', 'fill_skipped', { event: 'other', runId: 'spoofed' });
      const entry = JSON.parse((await readFile(join(runDir, 'logs.jsonl'), 'utf-8')).trim());
      expect(entry.event).toBe('fill_skipped');
      expect(entry.runId).toBe('run-1');
    });

    it('notifies listeners', async () => {
      const seen: LogEntry[] = [];
      logger.onEntry((entry) => seen.push(entry));
      await logger.info('capture_succeeded', { strategy: 'print' });
      expect(seen).toHaveLength(1);
      expect(seen[0].strategy).toBe('print');
    });
  });

  describe('saveDomSnapshot', () => {
    it('saves the markup beside the log', async () => {
      const html = '<div class="confirmation">Done</div>';
      const path = await logger.saveDomSnapshot('confirmation', html);
      expect(path).toBe(join(runDir, 'dom_confirmation.html'));
      expect(await readFile(path, 'utf-8')).toBe(html);
    });
  });

  it('exposes its directory', () => {
    expect(logger.getRunDir()).toBe(runDir);
  });
});
