export interface DropdownOption {
  value: string;
  text: string;
}

export interface PdfOptions {
  format: 'Letter' | 'A4';
  printBackground: boolean;
  marginInches: number;
  /** extra CSS injected before printing */
  style?: string;
}

/**
 * Everything the runtime needs from a browser. Selectors are plain strings
 * produced from an ElementLocator at the moment of use.
 */
export interface BrowserControl {
  goto(url: string): Promise<void>;
  /** Raw markup of the current document */
  content(): Promise<string>;
  /** Rendered text of the document body */
  bodyText(): Promise<string>;
  count(selector: string): Promise<number>;
  textsOf(selector: string): Promise<string[]>;
  scrollIntoView(selector: string): Promise<void>;
  click(selector: string): Promise<void>;
  fill(selector: string, value: string): Promise<void>;
  isChecked(selector: string): Promise<boolean>;
  options(selector: string): Promise<DropdownOption[]>;
  selectOption(selector: string, value: string): Promise<void>;
  /** Evaluate a script expression in the page and return its JSON result */
  evaluate(script: string): Promise<unknown>;
  printToPdf(options: PdfOptions): Promise<Buffer>;
  close(): Promise<void>;
}
