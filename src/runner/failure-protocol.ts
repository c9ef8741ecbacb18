import type { FailureClassification } from '../types/index.js';
import type { CapturePipeline } from '../capture/capture-pipeline.js';
import type { FailureDetailExtractor } from '../extraction/failure-details.js';
import type { NotificationGateway } from '../gateways/types.js';
import { errorMessage } from '../utils/timing.js';
import type { ArtifactPublisher } from './artifact-publisher.js';
import type { WorkflowContext } from './workflow-context.js';

export const FAILURE_STATUS = 'fail';

export interface FailureProtocolDeps {
  details: FailureDetailExtractor;
  pipeline: CapturePipeline;
  publisher: ArtifactPublisher;
  notifier: NotificationGateway;
  sentinelMessage: string;
}

/**
 * What happens once a run is known to have failed: work out code and
 * message, store the structured record, capture the page, notify. Running
 * it again for the same page state returns the earlier result.
 */
export class FailureProtocol {
  constructor(private deps: FailureProtocolDeps) {}

  async run(
    context: WorkflowContext,
    classification: FailureClassification,
    pageText?: string,
  ): Promise<FailureClassification> {
    const text = pageText ?? (await this.readPage(context));
    if (context.failureHandledFor === text && context.classification.kind !== 'None') {
      return context.classification;
    }
    context.failureHandledFor = text;

    let { code, message } = classification;
    if (!code && !message) {
      const found = await this.deps.details.extract(context.browser, text);
      code = code ?? found.code;
      message = message ?? found.message;
    }

    const final: FailureClassification = {
      kind: classification.kind,
      code,
      message: message ?? this.deps.sentinelMessage,
    };
    context.classification = final;
    context.state = 'Failure';

    context.note('Status', FAILURE_STATUS);
    context.note('FailureKind', final.kind);
    context.note('FailedAt', new Date().toISOString());
    context.note('ErrorCode', final.code);
    context.note('ErrorMessage', final.message);
    await context.logger.error('failure_detected', { ...final });

    await this.deps.publisher.publishStructuredLog(context.record.recordId, context.structuredLog());

    const capture = await this.deps.pipeline.run(
      { purpose: 'diagnostic', mode: 'first' },
      {
        runId: context.runId,
        recordId: context.record.recordId,
        entityName: context.record.entityName,
        externalIds: context.record.externalIds,
      },
    );
    context.captureAttempts.push(...capture.attempts);
    context.artifacts.push(...(await this.deps.publisher.publish(capture.descriptors, 'diagnostic')));

    await this.deps.notifier.notifyFailure(
      context.record.recordId,
      final.code ?? FAILURE_STATUS,
      FAILURE_STATUS,
      context.structuredLog(),
    );
    return final;
  }

  private async readPage(context: WorkflowContext): Promise<string> {
    try {
      return await context.browser.bodyText();
    } catch (error) {
      await context.logger.warn('failure_page_unreadable', { error: errorMessage(error) });
      return '';
    }
  }
}
