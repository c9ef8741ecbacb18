import type {
  ArtifactDescriptor,
  ArtifactPurpose,
  CaptureAttempt,
  ElementLocator,
  ExternalIds,
} from '../types/index.js';
import type { BrowserControl } from '../engines/browser-control.js';
import type { Interactor } from '../interaction/interactor.js';
import type { RecoveryLog } from '../logging/recovery-log.js';
import { silentLogger, type EventLogger } from '../logging/run-logger.js';
import { errorMessage } from '../utils/timing.js';
import { artifactName } from './artifact-naming.js';
import type { StagingArea } from './staging-area.js';
import { CAPTURE_STRATEGIES, type CaptureContext, type CaptureStrategy } from './strategies.js';

export type CaptureMode = 'first' | 'all';

export interface CaptureSubject {
  runId: string;
  recordId: string;
  entityName: string;
  externalIds: ExternalIds;
}

export interface CaptureRequest {
  purpose: ArtifactPurpose;
  mode: CaptureMode;
  strategies?: readonly CaptureStrategy[];
  documentLocator?: ElementLocator;
}

export interface CaptureOutcome {
  attempts: CaptureAttempt[];
  descriptors: ArtifactDescriptor[];
}

export interface CapturePipelineDeps {
  browser: BrowserControl;
  interactor: Interactor;
  staging: StagingArea;
  recovery: RecoveryLog;
  downloadTimeoutMs: number;
  pollMs: number;
  signal?: AbortSignal;
  logger?: EventLogger;
}

/**
 * Runs capture strategies in priority order. Every strategy tried leaves a
 * CaptureAttempt. Every payload is in the recovery log before a descriptor
 * for it is returned, so nothing reaches storage without a local copy.
 */
export class CapturePipeline {
  private logger: EventLogger;

  constructor(private deps: CapturePipelineDeps) {
    this.logger = deps.logger ?? silentLogger;
  }

  async run(request: CaptureRequest, subject: CaptureSubject): Promise<CaptureOutcome> {
    const strategies = request.strategies ?? CAPTURE_STRATEGIES[request.purpose];
    const attempts: CaptureAttempt[] = [];
    const descriptors: ArtifactDescriptor[] = [];

    const context: CaptureContext = {
      browser: this.deps.browser,
      interactor: this.deps.interactor,
      staging: this.deps.staging,
      recovery: this.deps.recovery,
      purpose: request.purpose,
      runId: subject.runId,
      recordId: subject.recordId,
      entityName: subject.entityName,
      documentLocator: request.documentLocator,
      downloadTimeoutMs: this.deps.downloadTimeoutMs,
      pollMs: this.deps.pollMs,
      signal: this.deps.signal,
    };

    for (const strategy of strategies) {
      this.deps.signal?.throwIfAborted();
      const primary = descriptors.length === 0;
      const logicalName = artifactName(subject.recordId, subject.entityName, request.purpose, strategy.name, primary);
      let payload: Buffer | null = null;
      let recorded = false;

      try {
        const captured = await strategy.capture(context, logicalName);
        payload = captured.bytes;
        recorded = captured.recorded;
      } catch (error) {
        if (this.deps.signal?.aborted) throw error;
        attempts.push({ strategyName: strategy.name, succeeded: false, byteLength: 0, errorDetail: errorMessage(error) });
        await this.logger.log('warn', 'capture_strategy_failed', {
          purpose: request.purpose,
          strategy: strategy.name,
          error: errorMessage(error),
        });
        continue;
      }

      if (payload.length === 0) {
        attempts.push({ strategyName: strategy.name, succeeded: false, byteLength: 0, errorDetail: 'empty payload' });
        continue;
      }

      attempts.push({ strategyName: strategy.name, succeeded: true, byteLength: payload.length });

      if (!recorded) {
        await this.backup(subject, logicalName, strategy.name, payload);
      }

      descriptors.push({
        logicalName,
        recordId: subject.recordId,
        contentType: 'application/pdf',
        visibilityFlag: request.purpose !== 'completion' || !primary,
        externalIds: subject.externalIds,
        strategyName: strategy.name,
        payloadBytes: payload,
      });
      await this.logger.log('info', 'capture_succeeded', {
        purpose: request.purpose,
        strategy: strategy.name,
        byteLength: payload.length,
        logicalName,
      });

      if (request.mode === 'first') break;
    }

    return { attempts, descriptors };
  }

  private async backup(subject: CaptureSubject, logicalName: string, strategyName: string, bytes: Buffer): Promise<void> {
    try {
      await this.deps.recovery.write({
        runId: subject.runId,
        recordId: subject.recordId,
        entityName: subject.entityName,
        logicalName,
        strategyName,
        bytes,
      });
    } catch (error) {
      await this.logger.log('error', 'recovery_write_failed', { logicalName, error: errorMessage(error) });
    }
  }
}
