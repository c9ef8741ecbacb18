import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { z } from 'zod';

export const RecoveryEntrySchema = z.object({
  timestamp: z.string(),
  runId: z.string(),
  recordId: z.string(),
  entityName: z.string(),
  logicalName: z.string(),
  strategyName: z.string(),
  byteLength: z.number().int().nonnegative(),
  contentBase64: z.string(),
});

export type RecoveryEntry = z.infer<typeof RecoveryEntrySchema>;

export interface RecoveryPayload {
  runId: string;
  recordId: string;
  entityName: string;
  logicalName: string;
  strategyName: string;
  bytes: Buffer;
}

/**
 * Append-only base64 copies of every captured document, written before the
 * document is handed to storage. Backed by `recovery.jsonl` in the run
 * directory, which is only as durable as that directory.
 */
export class RecoveryLog {
  private path: string;

  constructor(runDir: string) {
    this.path = join(runDir, 'recovery.jsonl');
  }

  async write(payload: RecoveryPayload): Promise<RecoveryEntry> {
    const entry: RecoveryEntry = {
      timestamp: new Date().toISOString(),
      runId: payload.runId,
      recordId: payload.recordId,
      entityName: payload.entityName,
      logicalName: payload.logicalName,
      strategyName: payload.strategyName,
      byteLength: payload.bytes.length,
      contentBase64: payload.bytes.toString('base64'),
    };
    await mkdir(dirname(this.path), { recursive: true });
    await appendFile(this.path, JSON.stringify(entry) + '\n', 'utf-8');
    return entry;
  }

  async readAll(): Promise<RecoveryEntry[]> {
    let raw: string;
    try {
      raw = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return [];
      throw error;
    }
    return raw
      .split('\n')
      .filter((line) => line.trim().length > 0)
      .map((line) => RecoveryEntrySchema.parse(JSON.parse(line)));
  }

  /** Decode one entry back to the original bytes. */
  static decode(entry: RecoveryEntry): Buffer {
    return Buffer.from(entry.contentBase64, 'base64');
  }
}
