import type {
  ArtifactReference,
  CaptureAttempt,
  CaseRecord,
  FailureClassification,
  WorkflowState,
} from '../types/index.js';
import type { BrowserControl } from '../engines/browser-control.js';
import type { StagingArea } from '../capture/staging-area.js';
import type { StructuredLog, StructuredLogValue } from '../gateways/types.js';
import type { RunLogger } from '../logging/run-logger.js';
import { errorMessage } from '../utils/timing.js';

export interface WorkflowContextInit {
  runId: string;
  record: CaseRecord;
  browser: BrowserControl;
  staging: StagingArea;
  logger: RunLogger;
  signal?: AbortSignal;
}

/**
 * Mutable state of one run. Owns the browser handle and the staging
 * directory until dispose().
 */
export class WorkflowContext {
  readonly runId: string;
  readonly record: Readonly<CaseRecord>;
  readonly browser: BrowserControl;
  readonly staging: StagingArea;
  readonly logger: RunLogger;
  readonly signal?: AbortSignal;
  readonly startedAt = new Date();

  state: WorkflowState = 'Start';
  completionNumber: string | null = null;
  classification: FailureClassification = { kind: 'None', code: null, message: null };
  artifacts: ArtifactReference[] = [];
  captureAttempts: CaptureAttempt[] = [];
  /** page text the failure protocol last ran against */
  failureHandledFor: string | null = null;

  private entries = new Map<string, StructuredLogValue>();
  private disposed = false;

  constructor(init: WorkflowContextInit) {
    this.runId = init.runId;
    this.record = init.record;
    this.browser = init.browser;
    this.staging = init.staging;
    this.logger = init.logger;
    this.signal = init.signal;
  }

  /** Add to the structured log; a repeated key overwrites the earlier value. */
  note(key: string, value: StructuredLogValue | undefined): void {
    if (value === undefined) return;
    this.entries.set(key, value);
  }

  structuredLog(): StructuredLog {
    return Object.fromEntries(this.entries);
  }

  /** Closes the browser and removes staging; failures are logged after both have been tried. */
  async dispose(keepBrowserOpen = false): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;

    const failures: [string, unknown][] = [];
    if (!keepBrowserOpen) {
      try {
        await this.browser.close();
      } catch (error) {
        failures.push(['browser_close_failed', error]);
      }
    }
    try {
      await this.staging.dispose();
    } catch (error) {
      failures.push(['staging_cleanup_failed', error]);
    }
    for (const [event, error] of failures) {
      await this.logger.warn(event, { error: errorMessage(error) });
    }
  }
}
