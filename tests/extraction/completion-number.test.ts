import { describe, it, expect, vi } from 'vitest';
import { extractCompletionNumber } from '../../src/extraction/completion-number.js';
import type { CompletionRules } from '../../src/types/index.js';
import { mockBrowser } from '../helpers/mock-browser.js';

const rules: CompletionRules = {
  labels: ['Identification Number', 'Assigned Number'],
  pattern: '\\b\\d{2}-\\d{7}\\b',
  separator: '-',
  documentLocator: { strategy: 'text', value: 'Download Confirmation Letter' },
};

function textsBySelector(map: Record<string, string[]>) {
  return vi.fn(async (selector: string) => map[selector] ?? []);
}

describe('extractCompletionNumber', () => {
  it('prefers a labelled table row', async () => {
    const browser = mockBrowser({
      textsOf: textsBySelector({
        tr: ['Date 10-19-2026', 'Assigned Number 12-3456789'],
        'b, strong': ['99-0000000'],
      }),
    });

    expect(await extractCompletionNumber(browser, rules, null)).toEqual({
      value: '12-3456789',
      heuristic: 'table-row',
      offline: false,
    });
  });

  it('falls back to bold text containing the separator', async () => {
    const browser = mockBrowser({ textsOf: textsBySelector({ 'b, strong': ['Congratulations', '12-3456789'] }) });

    expect(await extractCompletionNumber(browser, rules, null)).toMatchObject({
      value: '12-3456789',
      heuristic: 'bold-text',
    });
  });

  it('scans the whole page last', async () => {
    const browser = mockBrowser({ bodyText: vi.fn().mockResolvedValue('Your number is 98-7654321.') });

    expect(await extractCompletionNumber(browser, rules, null)).toMatchObject({
      value: '98-7654321',
      heuristic: 'page-scan',
    });
  });

  it('returns null when nothing matches', async () => {
    expect(await extractCompletionNumber(mockBrowser(), rules, null)).toEqual({
      value: null,
      heuristic: null,
      offline: false,
    });
  });

  it('re-parses the captured markup when the live page cannot be queried', async () => {
    const browser = mockBrowser({ textsOf: vi.fn().mockRejectedValue(new Error('Target closed')) });
    const html =
      '<html><body><table><tr><td>Identification Number: </td><td>45-1234567</td></tr></table></body></html>';

    expect(await extractCompletionNumber(browser, rules, html)).toEqual({
      value: '45-1234567',
      heuristic: 'table-row',
      offline: true,
    });
  });

  it('reports offline with no value when there is no captured markup', async () => {
    const browser = mockBrowser({ textsOf: vi.fn().mockRejectedValue(new Error('Target closed')) });

    expect(await extractCompletionNumber(browser, rules, null)).toEqual({
      value: null,
      heuristic: null,
      offline: true,
    });
  });
});
