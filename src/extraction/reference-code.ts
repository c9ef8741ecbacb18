import { z } from 'zod';
import type { ReferenceRules } from '../types/index.js';
import { patternInElements } from '../engines/page-scripts.js';
import type { EventLogger } from '../logging/run-logger.js';
import { OfflinePage, markupToText, scopeSelector } from './html-text.js';
import { LayeredExtractor, type ExtractionStrategy } from './layered-extractor.js';

function squash(text: string): string {
  return text.toLowerCase().replace(/[^a-z0-9]/g, '');
}

/** Marker present in any case, spacing or punctuation. */
export function hasMarker(pageText: string, markers: string[]): boolean {
  const haystack = squash(pageText);
  return markers.some((marker) => haystack.includes(squash(marker)));
}

function firstMatch(texts: string[], pattern: RegExp): string | null {
  for (const text of texts) {
    const match = text.match(pattern);
    if (match) return (match[1] ?? match[0]).trim();
  }
  return null;
}

export function referenceStrategies(rules: ReferenceRules): ExtractionStrategy[] {
  const pattern = new RegExp(rules.pattern, 'i');

  return [
    {
      name: 'panel-scoped',
      async run({ browser }) {
        return firstMatch(await browser.textsOf(scopeSelector(rules.panelSelector, rules.itemSelector)), pattern);
      },
    },
    {
      name: 'unscoped',
      async run({ browser }) {
        return firstMatch(await browser.textsOf(rules.itemSelector), pattern);
      },
    },
    {
      name: 'raw-pattern',
      async run(context) {
        return firstMatch([markupToText(await context.rawHtml())], pattern);
      },
    },
    {
      name: 'in-page-script',
      async run({ browser }) {
        const result = await browser.evaluate(patternInElements('body', rules.pattern));
        return z.string().nullable().parse(result);
      },
    },
    {
      name: 'offline-reparse',
      async run(context) {
        const page = new OfflinePage(await context.rawHtml());
        return firstMatch([...page.texts(rules.itemSelector), page.bodyText()], pattern);
      },
    },
  ];
}

/**
 * Terminal reference code on a rejection page. Returns nothing without
 * touching the browser unless the page text carries a marker phrase.
 */
export function createReferenceExtractor(rules: ReferenceRules, logger?: EventLogger): LayeredExtractor {
  return new LayeredExtractor(referenceStrategies(rules), {
    label: 'reference_code',
    precondition: (pageText) => hasMarker(pageText, rules.markers),
    logger,
  });
}
