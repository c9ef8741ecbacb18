import type { ElementLocator } from '../types/index.js';

function quote(value: string): string {
  return JSON.stringify(value);
}

/** Selector string for the page driver, built fresh for every use. */
export function toSelector(locator: ElementLocator): string {
  switch (locator.strategy) {
    case 'id':
      return `[id=${quote(locator.value)}]`;
    case 'css':
      return locator.value;
    case 'xpath':
      return `xpath=${locator.value}`;
    case 'name':
      return `[name=${quote(locator.value)}]`;
    case 'text':
      return `text=${quote(locator.value)}`;
    case 'ariaLabel':
      return `[aria-label=${quote(locator.value)}]`;
  }
}

/** Bare identifier usable for label/container lookups, when the locator has one. */
export function identifierOf(locator: ElementLocator): string | null {
  if (locator.strategy === 'id' || locator.strategy === 'name') return locator.value;
  const match = locator.value.match(/^#([\w-]+)$/);
  if (locator.strategy === 'css' && match) return match[1];
  return null;
}

export function describeLocator(locator: ElementLocator): string {
  return `${locator.strategy}:${locator.value}`;
}
