import { DOMParser } from 'linkedom';

interface ParsedNode {
  textContent: string | null;
}

interface ParsedDocument {
  querySelectorAll(selectors: string): ArrayLike<ParsedNode>;
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/** Prefix every member of a selector list with `scope`. */
export function scopeSelector(scope: string, selectorList: string): string {
  return selectorList
    .split(',')
    .map((part) => `${scope} ${part.trim()}`)
    .join(', ');
}

/** Crude tag strip for regex scans over raw markup. */
export function markupToText(html: string): string {
  return collapseWhitespace(
    html
      .replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, ' ')
      .replace(/<[^>]+>/g, ' ')
      .replace(/&nbsp;/gi, ' ')
      .replace(/&amp;/gi, '&')
      .replace(/&#35;|&num;/gi, '#'),
  );
}

/**
 * Offline view of a captured page. Tolerates broken markup; never touches
 * the live browser.
 */
export class OfflinePage {
  private doc: ParsedDocument;

  constructor(html: string) {
    this.doc = new DOMParser().parseFromString(html, 'text/html');
  }

  texts(selector: string): string[] {
    let nodes: ArrayLike<ParsedNode>;
    try {
      nodes = this.doc.querySelectorAll(selector);
    } catch {
      // selector syntax the offline parser does not support
      return [];
    }
    return Array.from(nodes)
      .map((node) => collapseWhitespace(node.textContent ?? ''))
      .filter((text) => text.length > 0);
  }

  bodyText(): string {
    return this.texts('body').join(' ');
  }
}
