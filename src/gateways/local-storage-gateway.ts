import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import type { ExternalIds } from '../types/index.js';
import { diagnosticLogName, structuredLogName } from '../capture/artifact-naming.js';
import type { ObjectStorageGateway, StructuredLog } from './types.js';

/** Writes objects under a local directory. Used when no storage endpoint is configured. */
export class LocalObjectStorageGateway implements ObjectStorageGateway {
  private root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  private async store(logicalName: string, data: Buffer | string): Promise<string> {
    const target = join(this.root, ...logicalName.split('/'));
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, data);
    return pathToFileURL(target).href;
  }

  async uploadArtifact(
    bytes: Buffer,
    logicalName: string,
    contentType: string,
    visibilityFlag: boolean,
    externalIds: ExternalIds,
  ): Promise<string> {
    const url = await this.store(logicalName, bytes);
    await this.store(
      `${logicalName}.meta.json`,
      JSON.stringify({ contentType, hiddenFromClient: visibilityFlag, ...externalIds }, null, 2),
    );
    return url;
  }

  async uploadStructuredLog(recordId: string, log: StructuredLog): Promise<boolean> {
    await this.store(structuredLogName(recordId), JSON.stringify(log, null, 2));
    return true;
  }

  async uploadDiagnosticLog(recordId: string, text: Buffer): Promise<string | null> {
    if (text.length === 0) return null;
    return this.store(diagnosticLogName(recordId, new Date()), text);
  }
}
