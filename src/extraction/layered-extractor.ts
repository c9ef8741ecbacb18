import type { BrowserControl } from '../engines/browser-control.js';
import { silentLogger, type EventLogger } from '../logging/run-logger.js';
import { errorMessage } from '../utils/timing.js';

/**
 * Per-call view of the page shared by every strategy. Raw markup is fetched
 * at most once per extraction.
 */
export class ExtractionContext {
  private html: Promise<string> | null = null;

  constructor(
    public browser: BrowserControl,
    /** rendered page text read by the caller before extraction started */
    public pageText: string,
  ) {}

  rawHtml(): Promise<string> {
    if (!this.html) this.html = this.browser.content();
    return this.html;
  }
}

export interface ExtractionStrategy {
  name: string;
  run(context: ExtractionContext): Promise<string | null>;
}

export interface ExtractionResult {
  value: string | null;
  strategy: string | null;
  /** names of strategies actually run, in order */
  attempted: string[];
}

export interface LayeredExtractorOptions {
  /** when it returns false no strategy runs */
  precondition?: (pageText: string) => boolean;
  logger?: EventLogger;
  label: string;
}

export class LayeredExtractor {
  private logger: EventLogger;

  constructor(
    private strategies: readonly ExtractionStrategy[],
    private options: LayeredExtractorOptions,
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  async extract(browser: BrowserControl, pageText: string): Promise<ExtractionResult> {
    const attempted: string[] = [];
    if (this.options.precondition && !this.options.precondition(pageText)) {
      return { value: null, strategy: null, attempted };
    }

    const context = new ExtractionContext(browser, pageText);
    for (const strategy of this.strategies) {
      attempted.push(strategy.name);
      try {
        const value = await strategy.run(context);
        if (value) {
          await this.logger.log('info', `${this.options.label}_extracted`, { strategy: strategy.name, value });
          return { value, strategy: strategy.name, attempted };
        }
      } catch (error) {
        await this.logger.log('debug', `${this.options.label}_strategy_failed`, {
          strategy: strategy.name,
          error: errorMessage(error),
        });
      }
    }
    return { value: null, strategy: null, attempted };
  }
}
