import { describe, it, expect, vi } from 'vitest';
import { createMessageExtractor, joinFragments } from '../../src/extraction/diagnostic-message.js';
import type { DiagnosticRules } from '../../src/types/index.js';
import { mockBrowser } from '../helpers/mock-browser.js';

const rules: DiagnosticRules = {
  panelSelectors: ['.section-alert', '.error-summary'],
  itemSelector: 'li',
  ignoredHeaders: ['There is a problem'],
  patterns: ['error:\\s*([^.]+)'],
  sentinelMessage: 'Submission failed without a readable error message',
};

describe('joinFragments', () => {
  it('drops headers, blanks and repeats', () => {
    expect(
      joinFragments(['There is a problem', ' Name is  required ', 'Name is required', '', 'Invalid ZIP'], rules.ignoredHeaders),
    ).toBe('Name is required; Invalid ZIP');
  });

  it('returns null when nothing is left', () => {
    expect(joinFragments(['  there is a PROBLEM ', ' '], rules.ignoredHeaders)).toBeNull();
  });
});

describe('message extractor', () => {
  it('joins items across every alert panel', async () => {
    const texts: Record<string, string[]> = {
      '.section-alert li': ['There is a problem', 'Address is incomplete'],
      '.error-summary li': ['Address is incomplete', 'Start date is invalid'],
    };
    const browser = mockBrowser({ textsOf: vi.fn(async (selector: string) => texts[selector] ?? []) });
    const result = await createMessageExtractor(rules).extract(browser, '');

    expect(result.value).toBe('Address is incomplete; Start date is invalid');
    expect(result.strategy).toBe('panel-scoped');
  });

  it('scans the raw markup with the configured patterns', async () => {
    const browser = mockBrowser({
      content: vi.fn().mockResolvedValue('<div>Error: Closing month is required.</div>'),
    });
    const result = await createMessageExtractor(rules).extract(browser, '');

    expect(result.value).toBe('Closing month is required');
    expect(result.strategy).toBe('raw-pattern');
  });

  it('gives up with null when the page says nothing readable', async () => {
    const result = await createMessageExtractor(rules).extract(mockBrowser(), '');

    expect(result.value).toBeNull();
    expect(result.attempted).toHaveLength(5);
  });
});
