export type LocatorStrategy = 'id' | 'css' | 'xpath' | 'name' | 'text' | 'ariaLabel';

/**
 * Re-resolvable description of a control. Turned into a selector string at
 * the moment of use; the page may have reloaded since the last lookup.
 */
export interface ElementLocator {
  strategy: LocatorStrategy;
  value: string;
}
