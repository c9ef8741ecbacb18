import type { SiteProfile } from '../types/index.js';
import type { BrowserControl } from '../engines/browser-control.js';
import type { EventLogger } from '../logging/run-logger.js';
import { createMessageExtractor } from './diagnostic-message.js';
import { createReferenceExtractor } from './reference-code.js';
import type { LayeredExtractor } from './layered-extractor.js';

export interface FailureDetails {
  code: string | null;
  message: string | null;
}

/** Reference code first; the free-text message only when no code was found. */
export class FailureDetailExtractor {
  constructor(
    private reference: LayeredExtractor,
    private message: LayeredExtractor,
  ) {}

  static fromProfile(profile: SiteProfile, logger?: EventLogger): FailureDetailExtractor {
    return new FailureDetailExtractor(
      createReferenceExtractor(profile.reference, logger),
      createMessageExtractor(profile.diagnostics, logger),
    );
  }

  async extract(browser: BrowserControl, pageText: string): Promise<FailureDetails> {
    const code = (await this.reference.extract(browser, pageText)).value;
    if (code) return { code, message: null };
    const message = (await this.message.extract(browser, pageText)).value;
    return { code: null, message };
  }
}
