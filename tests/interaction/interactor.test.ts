import { describe, it, expect, vi } from 'vitest';
import { Interactor } from '../../src/interaction/interactor.js';
import { RADIO_STRATEGIES, type RadioStrategy } from '../../src/interaction/radio-strategies.js';
import { InteractionFailure } from '../../src/exception/errors.js';
import type { ElementLocator } from '../../src/types/index.js';
import { mockBrowser } from '../helpers/mock-browser.js';

const radio: ElementLocator = { strategy: 'id', value: 'entity-llc' };
const field: ElementLocator = { strategy: 'id', value: 'legal-name' };

describe('Interactor', () => {
  describe('fill', () => {
    it('skips empty and whitespace-only values without touching the page', async () => {
      const browser = mockBrowser();
      const interactor = new Interactor(browser, { retries: 3, backoffMs: 0 });

      expect(await interactor.fill(field, '')).toBe(false);
      expect(await interactor.fill(field, '   ', { required: true })).toBe(false);
      expect(browser.count).not.toHaveBeenCalled();
      expect(browser.fill).not.toHaveBeenCalled();
    });

    it('clears then sets the value', async () => {
      const browser = mockBrowser();
      const interactor = new Interactor(browser, { retries: 1, backoffMs: 0 });

      expect(await interactor.fill(field, 'Acme')).toBe(true);
      expect(browser.scrollIntoView).toHaveBeenCalledWith('[id="legal-name"]');
      expect(browser.fill).toHaveBeenNthCalledWith(1, '[id="legal-name"]', '');
      expect(browser.fill).toHaveBeenNthCalledWith(2, '[id="legal-name"]', 'Acme');
    });

    it('throws InteractionFailure for a missing required field', async () => {
      const browser = mockBrowser({ count: vi.fn().mockResolvedValue(0) });
      const interactor = new Interactor(browser, { retries: 2, backoffMs: 0 });

      await expect(interactor.fill(field, 'Acme', { required: true })).rejects.toThrow(InteractionFailure);
      expect(browser.count).toHaveBeenCalledTimes(2);
    });

    it('returns false for a missing optional field', async () => {
      const browser = mockBrowser({ count: vi.fn().mockResolvedValue(0) });
      const interactor = new Interactor(browser, { retries: 2, backoffMs: 0 });

      expect(await interactor.fill(field, 'Acme')).toBe(false);
    });
  });

  describe('click', () => {
    it('falls back to a scripted click when the native click throws', async () => {
      const browser = mockBrowser({
        click: vi.fn().mockRejectedValue(new Error('Element click intercepted')),
        evaluate: vi.fn().mockResolvedValue(true),
      });
      const interactor = new Interactor(browser, { retries: 1, backoffMs: 0 });

      expect(await interactor.click({ strategy: 'id', value: 'continue-button' })).toBe(true);
      expect(browser.evaluate).toHaveBeenCalledTimes(1);
    });
  });

  describe('selectRadio', () => {
    it('uses the strategies in their fixed order', () => {
      expect(RADIO_STRATEGIES.map((s) => s.name)).toEqual([
        'scripted-check',
        'direct-click',
        'label-click',
        'container-click',
        'alternate-identifier',
      ]);
    });

    it('stops at the first strategy that leaves the radio checked', async () => {
      const browser = mockBrowser({
        evaluate: vi.fn().mockResolvedValue(false),
        isChecked: vi.fn().mockResolvedValue(true),
      });
      const interactor = new Interactor(browser, { retries: 1, backoffMs: 0 });

      expect(await interactor.selectRadio(radio)).toBe(true);
      expect(browser.evaluate).toHaveBeenCalledTimes(1);
      expect(browser.click).toHaveBeenCalledTimes(1);
      expect(browser.click).toHaveBeenCalledWith('[id="entity-llc"]');
    });

    it('continues after a strategy throws', async () => {
      const calls: string[] = [];
      const strategies: RadioStrategy[] = [
        {
          name: 'first',
          attempt: async () => {
            calls.push('first');
            throw new Error('detached');
          },
        },
        {
          name: 'second',
          attempt: async () => {
            calls.push('second');
            return true;
          },
        },
      ];
      const interactor = new Interactor(mockBrowser(), { retries: 1, backoffMs: 0, radioStrategies: strategies });

      expect(await interactor.selectRadio(radio)).toBe(true);
      expect(calls).toEqual(['first', 'second']);
    });

    it('retries the whole chain and throws on exhaustion when required', async () => {
      const attempt = vi.fn().mockResolvedValue(false);
      const interactor = new Interactor(mockBrowser(), {
        retries: 3,
        backoffMs: 0,
        radioStrategies: [{ name: 'only', attempt }],
      });

      await expect(interactor.selectRadio(radio, { required: true, label: 'Entity category' })).rejects.toMatchObject({
        name: 'InteractionFailure',
        action: 'radio',
        target: 'Entity category',
      });
      expect(attempt).toHaveBeenCalledTimes(3);
    });
  });

  describe('selectDropdown', () => {
    it('selects the matched option by its value', async () => {
      const browser = mockBrowser({
        options: vi.fn().mockResolvedValue([
          { value: '', text: 'Select' },
          { value: '08', text: 'August' },
        ]),
      });
      const interactor = new Interactor(browser, { retries: 1, backoffMs: 0 });

      expect(await interactor.selectDropdown({ strategy: 'id', value: 'start-month' }, '8')).toBe(true);
      expect(browser.selectOption).toHaveBeenCalledWith('[id="start-month"]', '08');
    });

    it('reports no match as a failure', async () => {
      const browser = mockBrowser({ options: vi.fn().mockResolvedValue([{ value: '1', text: 'January' }]) });
      const interactor = new Interactor(browser, { retries: 1, backoffMs: 0 });

      expect(await interactor.selectDropdown({ strategy: 'id', value: 'start-month' }, '13')).toBe(false);
      expect(browser.selectOption).not.toHaveBeenCalled();
    });
  });
});
