import { z } from 'zod';
import type { ElementLocator } from '../types/index.js';
import type { BrowserControl } from '../engines/browser-control.js';
import { describeLocator, toSelector } from '../engines/locator.js';
import { scriptedClick } from '../engines/page-scripts.js';
import { InteractionFailure } from '../exception/errors.js';
import { silentLogger, type EventLogger } from '../logging/run-logger.js';
import { errorMessage, sleep } from '../utils/timing.js';
import { matchDropdownOption } from './dropdown-matcher.js';
import { RADIO_STRATEGIES, type RadioStrategy } from './radio-strategies.js';

export interface InteractorOptions {
  /** attempts of the whole strategy chain per action */
  retries: number;
  backoffMs: number;
  logger?: EventLogger;
  signal?: AbortSignal;
  radioStrategies?: readonly RadioStrategy[];
}

export interface ActionOptions {
  /** throw InteractionFailure instead of returning false once every attempt fails */
  required?: boolean;
  label?: string;
}

type ActionKind = InteractionFailure['action'];

/**
 * Performs single UI actions through ordered fallbacks. A failing technique
 * is logged and the next one tried; only exhaustion on a required action
 * throws.
 */
export class Interactor {
  private logger: EventLogger;
  private radioStrategies: readonly RadioStrategy[];

  constructor(
    private browser: BrowserControl,
    private options: InteractorOptions,
  ) {
    this.logger = options.logger ?? silentLogger;
    this.radioStrategies = options.radioStrategies ?? RADIO_STRATEGIES;
  }

  async fill(locator: ElementLocator, value: string, opts: ActionOptions = {}): Promise<boolean> {
    const target = opts.label ?? describeLocator(locator);
    if (!value.trim()) {
      await this.logger.log('debug', 'fill_skipped', { target });
      return false;
    }

    const selector = toSelector(locator);
    return this.attempt('fill', target, opts, async () => {
      if ((await this.browser.count(selector)) === 0) return false;
      await this.browser.scrollIntoView(selector);
      await this.browser.fill(selector, '');
      await this.browser.fill(selector, value);
      return true;
    });
  }

  async click(locator: ElementLocator, opts: ActionOptions = {}): Promise<boolean> {
    const target = opts.label ?? describeLocator(locator);
    const selector = toSelector(locator);
    return this.attempt('click', target, opts, async () => {
      try {
        await this.browser.scrollIntoView(selector);
        await this.browser.click(selector);
        return true;
      } catch (error) {
        await this.logger.log('debug', 'click_fallback', { target, error: errorMessage(error) });
        return z.boolean().parse(await this.browser.evaluate(scriptedClick(locator)));
      }
    });
  }

  async selectRadio(locator: ElementLocator, opts: ActionOptions = {}): Promise<boolean> {
    const target = opts.label ?? describeLocator(locator);
    return this.attempt('radio', target, opts, async () => {
      for (const strategy of this.radioStrategies) {
        try {
          if (await strategy.attempt(this.browser, locator)) {
            await this.logger.log('debug', 'radio_selected', { target, strategy: strategy.name });
            return true;
          }
        } catch (error) {
          await this.logger.log('debug', 'radio_strategy_failed', {
            target,
            strategy: strategy.name,
            error: errorMessage(error),
          });
        }
      }
      return false;
    });
  }

  async selectDropdown(locator: ElementLocator, value: string, opts: ActionOptions = {}): Promise<boolean> {
    const target = opts.label ?? describeLocator(locator);
    if (!value.trim()) {
      await this.logger.log('debug', 'dropdown_skipped', { target });
      return false;
    }

    const selector = toSelector(locator);
    return this.attempt('dropdown', target, opts, async () => {
      const match = matchDropdownOption(await this.browser.options(selector), value);
      if (!match) return false;
      await this.browser.selectOption(selector, match.option.value);
      await this.logger.log('debug', 'dropdown_selected', {
        target,
        rule: match.rule,
        option: match.option.value,
      });
      return true;
    });
  }

  private async attempt(
    action: ActionKind,
    target: string,
    opts: ActionOptions,
    work: () => Promise<boolean>,
  ): Promise<boolean> {
    const attempts = Math.max(1, this.options.retries);
    let lastError = 'no strategy succeeded';

    for (let i = 1; i <= attempts; i++) {
      this.options.signal?.throwIfAborted();
      try {
        if (await work()) return true;
      } catch (error) {
        lastError = errorMessage(error);
        await this.logger.log('debug', `${action}_attempt_failed`, { target, attempt: i, error: lastError });
      }
      if (i < attempts) await sleep(this.options.backoffMs, this.options.signal);
    }

    const message = `${action} failed for ${target} after ${attempts} attempt(s): ${lastError}`;
    if (opts.required) {
      throw new InteractionFailure(message, action, target);
    }
    await this.logger.log('warn', `${action}_failed`, { target, error: lastError });
    return false;
  }
}
