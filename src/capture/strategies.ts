import type { ArtifactPurpose, ElementLocator } from '../types/index.js';
import type { BrowserControl } from '../engines/browser-control.js';
import type { Interactor } from '../interaction/interactor.js';
import type { RecoveryLog } from '../logging/recovery-log.js';
import { CaptureFailure } from '../exception/errors.js';
import type { StagingArea } from './staging-area.js';

export interface CaptureContext {
  browser: BrowserControl;
  interactor: Interactor;
  staging: StagingArea;
  recovery: RecoveryLog;
  purpose: ArtifactPurpose;
  runId: string;
  recordId: string;
  entityName: string;
  /** control that makes the site hand out the document */
  documentLocator?: ElementLocator;
  downloadTimeoutMs: number;
  pollMs: number;
  signal?: AbortSignal;
}

export interface CapturedPayload {
  bytes: Buffer;
  /** the strategy already wrote its own recovery copy */
  recorded: boolean;
}

export interface CaptureStrategy {
  name: string;
  /** logicalName is the storage name the payload will be published under */
  capture(context: CaptureContext, logicalName: string): Promise<CapturedPayload>;
}

const PRINT_STYLE = `
  @page { size: letter; margin: 0; }
  * { float: none !important; column-count: 1 !important; }
  body { width: auto !important; margin: 0 !important; }
  header, footer, nav, .no-print { display: none !important; }
`;

async function triggerDownload(context: CaptureContext, strategy: string): Promise<string> {
  if (!context.documentLocator) {
    throw new CaptureFailure(`${strategy}: no document control for ${context.purpose}`, context.purpose);
  }
  const before = await context.staging.snapshot();
  await context.interactor.click(context.documentLocator, { required: true, label: 'document control' });
  const path = await context.staging.waitForDocument({
    timeoutMs: context.downloadTimeoutMs,
    pollMs: context.pollMs,
    extension: '.pdf',
    ignore: before,
    signal: context.signal,
  });
  if (!path) {
    throw new CaptureFailure(
      `${strategy}: no completed download within ${context.downloadTimeoutMs}ms`,
      context.purpose,
    );
  }
  return path;
}

export const downloadStrategy: CaptureStrategy = {
  name: 'download',
  async capture(context) {
    const path = await triggerDownload(context, 'download');
    const bytes = await context.staging.read(path);
    await context.staging.remove(path);
    return { bytes, recorded: false };
  },
};

/** Download, then keep a base64 copy in the recovery log before the staged file goes. */
export const encodedDownloadStrategy: CaptureStrategy = {
  name: 'encoded-download',
  async capture(context, logicalName) {
    const path = await triggerDownload(context, 'encoded-download');
    const bytes = await context.staging.read(path);
    let recorded = false;
    if (bytes.length > 0) {
      await context.recovery.write({
        runId: context.runId,
        recordId: context.recordId,
        entityName: context.entityName,
        logicalName,
        strategyName: 'encoded-download',
        bytes,
      });
      recorded = true;
    }
    await context.staging.remove(path);
    return { bytes, recorded };
  },
};

export const printStrategy: CaptureStrategy = {
  name: 'print',
  async capture(context) {
    const bytes = await context.browser.printToPdf({
      format: 'Letter',
      printBackground: true,
      marginInches: 0,
      style: PRINT_STYLE,
    });
    return { bytes, recorded: false };
  },
};

/** Strategy lists by purpose, most authoritative first. */
export const CAPTURE_STRATEGIES: Record<ArtifactPurpose, readonly CaptureStrategy[]> = {
  completion: [downloadStrategy, encodedDownloadStrategy, printStrategy],
  submission: [printStrategy],
  diagnostic: [printStrategy],
};
