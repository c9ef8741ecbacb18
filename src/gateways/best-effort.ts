import { silentLogger, type EventLogger } from '../logging/run-logger.js';
import { errorMessage } from '../utils/timing.js';
import type { ArtifactVisibility, NotificationGateway, StructuredLog } from './types.js';

/** Wraps a notification gateway so a failed call is logged and never escalates. */
export class BestEffortNotifier implements NotificationGateway {
  constructor(
    private inner: NotificationGateway,
    private logger: EventLogger = silentLogger,
  ) {}

  async notifySuccess(recordId: string, completionNumber: string): Promise<void> {
    await this.guard('notify_success', () => this.inner.notifySuccess(recordId, completionNumber));
  }

  async notifyFailure(recordId: string, code: string, status: 'fail', diagnosticContext: StructuredLog): Promise<void> {
    await this.guard('notify_failure', () => this.inner.notifyFailure(recordId, code, status, diagnosticContext));
  }

  async notifyArtifactAvailable(recordId: string, url: string, visibility: ArtifactVisibility): Promise<void> {
    await this.guard('notify_artifact', () => this.inner.notifyArtifactAvailable(recordId, url, visibility));
  }

  private async guard(event: string, call: () => Promise<void>): Promise<void> {
    try {
      await call();
    } catch (error) {
      await this.logger.log('warn', `${event}_failed`, { error: errorMessage(error) });
    }
  }
}

/** Stand-in used when no system of record is configured. */
export class LoggingNotifier implements NotificationGateway {
  constructor(private logger: EventLogger) {}

  async notifySuccess(recordId: string, completionNumber: string): Promise<void> {
    await this.logger.log('info', 'notify_success', { recordId, completionNumber });
  }

  async notifyFailure(recordId: string, code: string, status: 'fail', diagnosticContext: StructuredLog): Promise<void> {
    await this.logger.log('info', 'notify_failure', { recordId, code, status, diagnosticContext });
  }

  async notifyArtifactAvailable(recordId: string, url: string, visibility: ArtifactVisibility): Promise<void> {
    await this.logger.log('info', 'notify_artifact', { recordId, url, ...visibility });
  }
}
