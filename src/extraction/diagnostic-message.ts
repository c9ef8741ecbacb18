import { z } from 'zod';
import type { DiagnosticRules } from '../types/index.js';
import { textsInElements } from '../engines/page-scripts.js';
import type { EventLogger } from '../logging/run-logger.js';
import { OfflinePage, collapseWhitespace, markupToText, scopeSelector } from './html-text.js';
import { LayeredExtractor, type ExtractionStrategy } from './layered-extractor.js';

/**
 * Join message fragments with "; ", dropping generic headers, blanks and
 * repeats. Returns null when nothing is left.
 */
export function joinFragments(fragments: string[], ignoredHeaders: string[]): string | null {
  const ignored = new Set(ignoredHeaders.map((h) => collapseWhitespace(h).toLowerCase()));
  const kept: string[] = [];
  for (const fragment of fragments) {
    const text = collapseWhitespace(fragment);
    if (!text || ignored.has(text.toLowerCase())) continue;
    if (!kept.includes(text)) kept.push(text);
  }
  return kept.length > 0 ? kept.join('; ') : null;
}

export function messageStrategies(rules: DiagnosticRules): ExtractionStrategy[] {
  const scoped = rules.panelSelectors.map((panel) => scopeSelector(panel, rules.itemSelector));
  const join = (fragments: string[]) => joinFragments(fragments, rules.ignoredHeaders);

  return [
    {
      name: 'panel-scoped',
      async run({ browser }) {
        const fragments: string[] = [];
        for (const selector of scoped) {
          fragments.push(...(await browser.textsOf(selector)));
        }
        return join(fragments);
      },
    },
    {
      name: 'unscoped',
      async run({ browser }) {
        return join(await browser.textsOf(rules.itemSelector));
      },
    },
    {
      name: 'raw-pattern',
      async run(context) {
        const text = markupToText(await context.rawHtml());
        const fragments: string[] = [];
        for (const source of rules.patterns) {
          for (const match of text.matchAll(new RegExp(source, 'gi'))) {
            fragments.push(match[1] ?? match[0]);
          }
        }
        return join(fragments);
      },
    },
    {
      name: 'in-page-script',
      async run({ browser }) {
        const result = await browser.evaluate(textsInElements([...scoped, rules.itemSelector]));
        return join(z.array(z.string()).parse(result));
      },
    },
    {
      name: 'offline-reparse',
      async run(context) {
        const page = new OfflinePage(await context.rawHtml());
        return join([...scoped, rules.itemSelector].flatMap((selector) => page.texts(selector)));
      },
    },
  ];
}

export function createMessageExtractor(rules: DiagnosticRules, logger?: EventLogger): LayeredExtractor {
  return new LayeredExtractor(messageStrategies(rules), { label: 'diagnostic_message', logger });
}
