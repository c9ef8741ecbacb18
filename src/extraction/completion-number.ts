import type { CompletionRules } from '../types/index.js';
import type { BrowserControl } from '../engines/browser-control.js';
import { silentLogger, type EventLogger } from '../logging/run-logger.js';
import { errorMessage } from '../utils/timing.js';
import { OfflinePage } from './html-text.js';

export interface CompletionNumberResult {
  value: string | null;
  heuristic: 'table-row' | 'bold-text' | 'page-scan' | null;
  offline: boolean;
}

/** Read-only page queries the three heuristics share, live or offline. */
interface TextSource {
  texts(selector: string): Promise<string[]> | string[];
  bodyText(): Promise<string> | string;
}

function matcher(rules: CompletionRules): (text: string) => string | null {
  const pattern = new RegExp(rules.pattern);
  return (text) => text.match(pattern)?.[0] ?? null;
}

async function runHeuristics(
  source: TextSource,
  rules: CompletionRules,
): Promise<Omit<CompletionNumberResult, 'offline'>> {
  const find = matcher(rules);
  const labels = rules.labels.map((l) => l.toLowerCase());

  const rows = (await source.texts('tr')).filter((row) =>
    labels.some((label) => row.toLowerCase().includes(label)),
  );
  for (const row of rows) {
    const value = find(row);
    if (value) return { value, heuristic: 'table-row' };
  }

  const bold = (await source.texts('b, strong')).filter((text) => text.includes(rules.separator));
  for (const text of bold) {
    const value = find(text);
    if (value) return { value, heuristic: 'bold-text' };
  }

  const value = find(await source.bodyText());
  if (value) return { value, heuristic: 'page-scan' };

  return { value: null, heuristic: null };
}

/**
 * Completion number from the confirmation page. Live queries first; if the
 * live page cannot be queried at all the captured markup is re-parsed and
 * the same heuristics repeated.
 */
export async function extractCompletionNumber(
  browser: BrowserControl,
  rules: CompletionRules,
  capturedHtml: string | null,
  logger: EventLogger = silentLogger,
): Promise<CompletionNumberResult> {
  try {
    const live = await runHeuristics(
      { texts: (selector) => browser.textsOf(selector), bodyText: () => browser.bodyText() },
      rules,
    );
    return { ...live, offline: false };
  } catch (error) {
    await logger.log('warn', 'completion_live_query_failed', { error: errorMessage(error) });
  }

  if (!capturedHtml) return { value: null, heuristic: null, offline: true };

  const page = new OfflinePage(capturedHtml);
  const offline = await runHeuristics(
    { texts: (selector) => page.texts(selector), bodyText: () => page.bodyText() },
    rules,
  );
  return { ...offline, offline: true };
}
