import type { BoilerplateSets, FailureClassification } from '../types/index.js';
import type { BrowserControl } from '../engines/browser-control.js';
import type { FailureDetailExtractor } from '../extraction/failure-details.js';
import { silentLogger, type EventLogger } from '../logging/run-logger.js';
import { sleep } from '../utils/timing.js';

export type PageKind = 'None' | 'TerminalRejection' | 'ValidationError';

/** Case-insensitive boilerplate match. The terminal set wins over the validation set. */
export function classifyPageText(pageText: string, boilerplate: BoilerplateSets): PageKind {
  const text = pageText.replace(/\s+/g, ' ').toLowerCase();
  const contains = (phrase: string) => text.includes(phrase.replace(/\s+/g, ' ').toLowerCase());

  if (boilerplate.terminalRejection.some(contains)) return 'TerminalRejection';
  if (boilerplate.validationError.some(contains)) return 'ValidationError';
  return 'None';
}

export interface PageClassifierOptions {
  settleDelayMs: number;
  signal?: AbortSignal;
  logger?: EventLogger;
}

export interface PageVerdict {
  classification: FailureClassification;
  pageText: string;
}

/** Runs after every transition: settle, read the page, classify, extract details on failure. */
export class PageClassifier {
  private logger: EventLogger;

  constructor(
    private boilerplate: BoilerplateSets,
    private details: FailureDetailExtractor,
    private options: PageClassifierOptions,
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  async classify(browser: BrowserControl): Promise<PageVerdict> {
    await sleep(this.options.settleDelayMs, this.options.signal);
    const pageText = await browser.bodyText();
    const kind = classifyPageText(pageText, this.boilerplate);
    if (kind === 'None') {
      return { classification: { kind, code: null, message: null }, pageText };
    }

    const { code, message } = await this.details.extract(browser, pageText);
    await this.logger.log('warn', 'page_classified', { kind, code, message });
    return { classification: { kind, code, message }, pageText };
  }
}
