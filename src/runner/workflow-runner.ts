import { join } from 'node:path';
import type { CaseRecord, FailureClassification, RunResult, SiteProfile } from '../types/index.js';
import { CaseRecordSchema } from '../schemas/index.js';
import type { BrowserControl } from '../engines/browser-control.js';
import { CapturePipeline, type CaptureSubject } from '../capture/capture-pipeline.js';
import { StagingArea } from '../capture/staging-area.js';
import { InfrastructureError, InteractionFailure } from '../exception/errors.js';
import { PageClassifier } from '../exception/page-classifier.js';
import { extractCompletionNumber } from '../extraction/completion-number.js';
import { FailureDetailExtractor } from '../extraction/failure-details.js';
import { buildFormValues } from '../form/form-values.js';
import type { EntityTables } from '../form/tables.js';
import { BestEffortNotifier } from '../gateways/best-effort.js';
import type { NotificationGateway, ObjectStorageGateway } from '../gateways/types.js';
import { Interactor } from '../interaction/interactor.js';
import { RecoveryLog } from '../logging/recovery-log.js';
import { RunLogger, type LogEntry } from '../logging/run-logger.js';
import { writeSummary, type SummaryOptions } from '../logging/summary-writer.js';
import { orderedScreens } from '../profile/loader.js';
import { deepFreeze } from '../utils/freeze.js';
import { errorMessage } from '../utils/timing.js';
import { ArtifactPublisher } from './artifact-publisher.js';
import { FAILURE_STATUS, FailureProtocol } from './failure-protocol.js';
import { fillScreen } from './screen-filler.js';
import { WorkflowContext } from './workflow-context.js';

export interface RunnerTiming {
  actionRetries: number;
  retryBackoffMs: number;
  settleDelayMs: number;
  downloadTimeoutMs: number;
  downloadPollMs: number;
}

export interface WorkflowRunnerDeps {
  profile: SiteProfile;
  storage: ObjectStorageGateway;
  notifier: NotificationGateway;
  /** opens a browser whose downloads land in the given staging area */
  launchBrowser: (staging: StagingArea) => Promise<BrowserControl>;
  createStaging?: () => Promise<StagingArea>;
  runsDir: string;
  timing: RunnerTiming;
  keepBrowserOpen?: boolean;
  onLogEntry?: (entry: LogEntry) => void;
  tables?: EntityTables;
}

export interface RunOptions {
  signal?: AbortSignal;
}

interface RunParts {
  interactor: Interactor;
  classifier: PageClassifier;
  pipeline: CapturePipeline;
  protocol: FailureProtocol;
  publisher: ArtifactPublisher;
  notifier: NotificationGateway;
}

interface RunReport {
  summary: Omit<SummaryOptions, 'result'>;
  publisher: ArtifactPublisher;
}

interface RunOutcome {
  result: RunResult;
  /** null when the record never passed validation */
  report: RunReport | null;
}

function failedResult(runId: string, start: number, message: string): RunResult {
  return {
    runId,
    success: false,
    completionNumber: null,
    artifactReferences: [],
    classification: { kind: 'Unknown', code: null, message },
    finalState: 'Failure',
    captureAttempts: [],
    durationMs: Date.now() - start,
  };
}

function createRunId(): string {
  return `run-${Date.now()}-${Math.random().toString(36).slice(2, 7)}`;
}

function subjectOf(context: WorkflowContext): CaptureSubject {
  return {
    runId: context.runId,
    recordId: context.record.recordId,
    entityName: context.record.entityName,
    externalIds: context.record.externalIds,
  };
}

/**
 * Drives one case record through the form: fill, continue, checkpoint,
 * screen by screen, then reads the confirmation. Site-reported failures end
 * the run through the failure protocol; only infrastructure faults reach the
 * outer boundary, where they become a failed result.
 */
export class WorkflowRunner {
  constructor(private deps: WorkflowRunnerDeps) {}

  async runAutomation(input: unknown, options: RunOptions = {}): Promise<RunResult> {
    const start = Date.now();
    const runId = createRunId();
    const logger = new RunLogger(join(this.deps.runsDir, runId), runId);
    if (this.deps.onLogEntry) logger.onEntry(this.deps.onLogEntry);

    let outcome: RunOutcome;
    try {
      outcome = await this.execute(runId, start, input, logger, options);
    } catch (error) {
      // the run directory is unusable, so the listener is the only channel left
      const message = `Run log unavailable: ${errorMessage(error)}`;
      this.emit(runId, 'run_log_unavailable', message);
      return failedResult(runId, start, message);
    }

    if (outcome.report) {
      try {
        await this.report(outcome.result, outcome.report, logger);
      } catch (error) {
        this.emit(runId, 'run_report_failed', errorMessage(error));
      }
    }
    return outcome.result;
  }

  private emit(runId: string, event: string, error: string): void {
    this.deps.onLogEntry?.({ timestamp: new Date().toISOString(), runId, level: 'error', event, error });
  }

  private async execute(
    runId: string,
    start: number,
    input: unknown,
    logger: RunLogger,
    options: RunOptions,
  ): Promise<RunOutcome> {
    await logger.info('run_started', { profile: this.deps.profile.name });

    const parsed = CaseRecordSchema.safeParse(input);
    if (!parsed.success) {
      const message = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      await logger.error('invalid_case_record', { message });
      return { result: failedResult(runId, start, `Invalid case record: ${message}`), report: null };
    }
    const record: CaseRecord = deepFreeze(parsed.data);

    const notifier = new BestEffortNotifier(this.deps.notifier, logger);
    const publisher = new ArtifactPublisher(this.deps.storage, notifier, logger);
    let staging: StagingArea | null = null;
    let context: WorkflowContext | null = null;
    let fault: FailureClassification | null = null;

    try {
      staging = await (this.deps.createStaging ?? (() => StagingArea.create()))();
      const browser = await this.launch(staging);
      context = new WorkflowContext({ runId, record, browser, staging, logger, signal: options.signal });
      await this.drive(context, this.assemble(context, publisher, notifier));
    } catch (error) {
      fault = { kind: 'Unknown', code: null, message: errorMessage(error) };
      if (context) {
        context.classification = fault;
        context.state = 'Failure';
        context.note('Status', FAILURE_STATUS);
        context.note('ErrorMessage', fault.message);
      }
      await notifier.notifyFailure(record.recordId, FAILURE_STATUS, FAILURE_STATUS, context?.structuredLog() ?? {});
      await logger.error('run_aborted', {
        error: fault.message,
        errorType: error instanceof Error ? error.name : typeof error,
      });
    } finally {
      if (context) {
        await context.dispose(this.deps.keepBrowserOpen);
      } else if (staging) {
        await staging.dispose();
      }
    }

    const result: RunResult = {
      runId,
      success: context?.state === 'Success',
      completionNumber: context?.completionNumber ?? null,
      artifactReferences: context ? [...context.artifacts] : [],
      classification: fault ?? context?.classification ?? { kind: 'Unknown', code: null, message: null },
      finalState: context?.state ?? 'Failure',
      captureAttempts: context ? [...context.captureAttempts] : [],
      durationMs: Date.now() - start,
    };
    return {
      result,
      report: {
        summary: {
          runDir: logger.getRunDir(),
          recordId: record.recordId,
          entityName: record.entityName,
          startedAt: context?.startedAt ?? new Date(start),
          structuredLog: context?.structuredLog() ?? {},
        },
        publisher,
      },
    };
  }

  /** Writes and uploads the run summary, then logs the close of the run. */
  private async report(result: RunResult, report: RunReport, logger: RunLogger): Promise<void> {
    const text = await writeSummary({ ...report.summary, result });
    const logRef = await report.publisher.publishDiagnosticLog(report.summary.recordId, text);
    if (logRef) result.artifactReferences.push(logRef);

    await logger.info('run_finished', {
      success: result.success,
      finalState: result.finalState,
      classification: result.classification.kind,
      durationMs: result.durationMs,
    });
  }

  private async launch(staging: StagingArea): Promise<BrowserControl> {
    try {
      return await this.deps.launchBrowser(staging);
    } catch (error) {
      throw new InfrastructureError(`Browser unavailable: ${errorMessage(error)}`, error);
    }
  }

  private assemble(context: WorkflowContext, publisher: ArtifactPublisher, notifier: NotificationGateway): RunParts {
    const { profile, timing } = this.deps;
    const logger = context.logger;
    const interactor = new Interactor(context.browser, {
      retries: timing.actionRetries,
      backoffMs: timing.retryBackoffMs,
      signal: context.signal,
      logger,
    });
    const details = FailureDetailExtractor.fromProfile(profile, logger);
    const pipeline = new CapturePipeline({
      browser: context.browser,
      interactor,
      staging: context.staging,
      recovery: new RecoveryLog(logger.getRunDir()),
      downloadTimeoutMs: timing.downloadTimeoutMs,
      pollMs: timing.downloadPollMs,
      signal: context.signal,
      logger,
    });
    return {
      interactor,
      classifier: new PageClassifier(profile.boilerplate, details, {
        settleDelayMs: timing.settleDelayMs,
        signal: context.signal,
        logger,
      }),
      pipeline,
      protocol: new FailureProtocol({
        details,
        pipeline,
        publisher,
        notifier,
        sentinelMessage: profile.diagnostics.sentinelMessage,
      }),
      publisher,
      notifier,
    };
  }

  private async drive(context: WorkflowContext, parts: RunParts): Promise<void> {
    const { record } = context;
    const values = buildFormValues(record, this.deps.tables);

    context.note('RunId', context.runId);
    context.note('RecordId', record.recordId);
    context.note('EntityName', record.entityName);
    context.note('EntityType', record.entityType);
    context.note('Category', values['category']);
    context.note('SubType', values['subType']);
    context.note('StartedAt', context.startedAt.toISOString());

    await context.browser.goto(this.deps.profile.startUrl);

    for (const screen of orderedScreens(this.deps.profile)) {
      context.signal?.throwIfAborted();
      context.state = screen.state;
      await context.logger.info('state_entered', { state: screen.state });

      try {
        await fillScreen(screen, values, parts.interactor, context.logger);
        if (screen.state === 'Review') {
          await this.captureSubmission(context, parts);
        }
        await parts.interactor.click(screen.continue, { required: true, label: `${screen.state} continue` });
      } catch (error) {
        if (!(error instanceof InteractionFailure)) throw error;
        context.note('FailedField', error.target);
        await parts.protocol.run(context, { kind: 'Unknown', code: null, message: error.message });
        return;
      }

      if (screen.checkpoint === false) continue;
      const verdict = await parts.classifier.classify(context.browser);
      context.note(`Checkpoint.${screen.state}`, verdict.classification.kind);
      if (verdict.classification.kind !== 'None') {
        await parts.protocol.run(context, verdict.classification, verdict.pageText);
        return;
      }
    }

    await this.confirm(context, parts);
  }

  /** Hidden print of the review page, taken before the final submit. */
  private async captureSubmission(context: WorkflowContext, parts: RunParts): Promise<void> {
    const capture = await parts.pipeline.run({ purpose: 'submission', mode: 'first' }, subjectOf(context));
    context.captureAttempts.push(...capture.attempts);
    context.artifacts.push(...(await parts.publisher.publish(capture.descriptors, 'submission')));
  }

  private async confirm(context: WorkflowContext, parts: RunParts): Promise<void> {
    context.state = 'Confirmation';
    const { profile } = this.deps;
    const { recordId } = context.record;

    let html: string | null = null;
    try {
      html = await context.browser.content();
      await context.logger.saveDomSnapshot('confirmation', html);
    } catch (error) {
      await context.logger.warn('confirmation_snapshot_failed', { error: errorMessage(error) });
    }

    const found = await extractCompletionNumber(context.browser, profile.completion, html, context.logger);
    if (!found.value) {
      await parts.protocol.run(context, {
        kind: 'Unknown',
        code: null,
        message: 'No completion number on the confirmation page',
      });
      return;
    }

    context.completionNumber = found.value;
    context.note('CompletionNumber', found.value);
    context.note('CompletionSource', found.offline ? `${found.heuristic}:offline` : found.heuristic);
    await context.logger.info('completion_number_found', { value: found.value, heuristic: found.heuristic });
    await parts.notifier.notifySuccess(recordId, found.value);

    const capture = await parts.pipeline.run(
      { purpose: 'completion', mode: 'all', documentLocator: profile.completion.documentLocator },
      subjectOf(context),
    );
    context.captureAttempts.push(...capture.attempts);
    if (capture.descriptors.length === 0) {
      context.note('CaptureFailure', capture.attempts.map((a) => `${a.strategyName}: ${a.errorDetail ?? 'empty'}`).join('; '));
      await context.logger.warn('completion_capture_failed', { attempts: capture.attempts.length });
    }
    context.artifacts.push(...(await parts.publisher.publish(capture.descriptors, 'completion')));

    context.note('Status', 'success');
    await parts.publisher.publishStructuredLog(recordId, context.structuredLog());
    context.state = 'Success';
  }
}

/** One-shot form of WorkflowRunner.runAutomation. */
export async function runAutomation(
  caseRecord: unknown,
  deps: WorkflowRunnerDeps,
  options: RunOptions = {},
): Promise<RunResult> {
  return new WorkflowRunner(deps).runAutomation(caseRecord, options);
}
