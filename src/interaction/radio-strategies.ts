import { z } from 'zod';
import type { ElementLocator } from '../types/index.js';
import type { BrowserControl } from '../engines/browser-control.js';
import { identifierOf, toSelector } from '../engines/locator.js';
import { alternateCheck, scriptedCheck } from '../engines/page-scripts.js';

export interface RadioStrategy {
  name: string;
  /** true once the radio reads as checked */
  attempt(browser: BrowserControl, locator: ElementLocator): Promise<boolean>;
}

const ScriptResult = z.boolean();

async function clickAndVerify(browser: BrowserControl, clickTarget: string, radio: string): Promise<boolean> {
  if ((await browser.count(clickTarget)) === 0) return false;
  await browser.scrollIntoView(clickTarget);
  await browser.click(clickTarget);
  return browser.isChecked(radio);
}

export const scriptedCheckStrategy: RadioStrategy = {
  name: 'scripted-check',
  async attempt(browser, locator) {
    return ScriptResult.parse(await browser.evaluate(scriptedCheck(locator)));
  },
};

export const directClickStrategy: RadioStrategy = {
  name: 'direct-click',
  async attempt(browser, locator) {
    const selector = toSelector(locator);
    return clickAndVerify(browser, selector, selector);
  },
};

export const labelClickStrategy: RadioStrategy = {
  name: 'label-click',
  async attempt(browser, locator) {
    const id = identifierOf(locator);
    if (!id) return false;
    return clickAndVerify(browser, `label[for=${JSON.stringify(id)}]`, toSelector(locator));
  },
};

export const containerClickStrategy: RadioStrategy = {
  name: 'container-click',
  async attempt(browser, locator) {
    const id = identifierOf(locator);
    if (!id) return false;
    const quoted = JSON.stringify(id);
    const containers = [
      `label:has(input[id=${quoted}])`,
      `div:has(> input[id=${quoted}])`,
      `span:has(> input[id=${quoted}])`,
      `[data-radio-id=${quoted}]`,
      `[data-testid*=${quoted}]`,
    ];
    for (const container of containers) {
      if (await clickAndVerify(browser, container, toSelector(locator))) return true;
    }
    return false;
  },
};

export const alternateIdentifierStrategy: RadioStrategy = {
  name: 'alternate-identifier',
  async attempt(browser, locator) {
    const hint = identifierOf(locator) ?? locator.value;
    return ScriptResult.parse(await browser.evaluate(alternateCheck(hint)));
  },
};

/** Tried in this order; the first strategy that leaves the radio checked wins. */
export const RADIO_STRATEGIES: readonly RadioStrategy[] = [
  scriptedCheckStrategy,
  directClickStrategy,
  labelClickStrategy,
  containerClickStrategy,
  alternateIdentifierStrategy,
];
