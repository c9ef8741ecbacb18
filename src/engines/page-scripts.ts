import type { ElementLocator } from '../types/index.js';

/*
 * Scripts evaluated inside the page. They are kept as plain source text so
 * nothing the local transpiler injects ends up in the browser.
 */

const RESOLVE = `
function resolve(loc) {
  switch (loc.strategy) {
    case 'id': return document.getElementById(loc.value);
    case 'css': return document.querySelector(loc.value);
    case 'name': return document.querySelector('[name="' + loc.value + '"]');
    case 'ariaLabel': return document.querySelector('[aria-label="' + loc.value + '"]');
    case 'xpath':
      return document.evaluate(loc.value, document, null, XPathResult.FIRST_ORDERED_NODE_TYPE, null).singleNodeValue;
    case 'text': {
      const all = document.querySelectorAll('label, span, a, button, input, div');
      for (const el of all) {
        if ((el.textContent || el.value || '').trim() === loc.value) return el;
      }
      return null;
    }
  }
  return null;
}`;

function wrap(body: string, args: Record<string, unknown>): string {
  return `(() => {
${RESOLVE}
const args = ${JSON.stringify(args)};
${body}
})()`;
}

/** Set `checked` directly and fire the events a framework listens for. */
export function scriptedCheck(locator: ElementLocator): string {
  return wrap(
    `const el = resolve(args.locator);
if (!el) return false;
el.scrollIntoView({ block: 'center' });
el.checked = true;
for (const type of ['input', 'change', 'click']) {
  el.dispatchEvent(new Event(type, { bubbles: true }));
}
return el.checked === true;`,
    { locator },
  );
}

export function scriptedClick(locator: ElementLocator): string {
  return wrap(
    `const el = resolve(args.locator);
if (!el) return false;
el.scrollIntoView({ block: 'center' });
el.click();
return true;`,
    { locator },
  );
}

/** Look the radio up by partial id, name, value or role and force it checked. */
export function alternateCheck(hint: string): string {
  return wrap(
    `const h = args.hint;
const selectors = [
  'input[type="radio"][id="' + h + '"]',
  'input[type="radio"][id*="' + h + '"]',
  'input[type="radio"][name*="' + h + '"]',
  'input[type="radio"][value="' + h + '"]',
  '[role="radio"][id="' + h + '"]',
  '[role="radio"][data-value="' + h + '"]',
];
for (const selector of selectors) {
  const el = document.querySelector(selector);
  if (!el) continue;
  el.click();
  if (el.checked === true || el.getAttribute('aria-checked') === 'true') return true;
  el.checked = true;
  el.dispatchEvent(new Event('change', { bubbles: true }));
  return el.checked === true;
}
return false;`,
    { hint },
  );
}

/** First match of `pattern` group 1 in the text of any element matching `selector`. */
export function patternInElements(selector: string, pattern: string): string {
  return wrap(
    `const re = new RegExp(args.pattern, 'i');
for (const el of document.querySelectorAll(args.selector)) {
  const m = (el.textContent || '').match(re);
  if (m) return (m[1] || m[0]).trim();
}
return null;`,
    { selector, pattern },
  );
}

/** Text of every element matching any selector, in selector order. */
export function textsInElements(selectors: string[]): string {
  return wrap(
    `const out = [];
for (const selector of args.selectors) {
  for (const el of document.querySelectorAll(selector)) {
    const text = (el.textContent || '').trim();
    if (text) out.push(text);
  }
}
return out;`,
    { selectors },
  );
}
