import { rename } from 'node:fs/promises';
import { join } from 'node:path';
import { chromium, type Browser, type Download, type Page } from 'playwright-core';
import type { BrowserControl, DropdownOption, PdfOptions } from './browser-control.js';
import { errorMessage } from '../utils/timing.js';

export interface PlaywrightControlOptions {
  headless: boolean;
  /** completed downloads land here; in-flight ones carry a .crdownload suffix */
  downloadDir: string;
  actionTimeoutMs: number;
  /** how long close() waits for downloads still being saved */
  downloadTimeoutMs: number;
  executablePath?: string;
}

export class PlaywrightBrowserControl implements BrowserControl {
  private pendingDownloads: Promise<void>[] = [];
  private downloadErrors: string[] = [];

  constructor(
    private browser: Browser,
    private page: Page,
    private config: PlaywrightControlOptions,
  ) {
    page.setDefaultTimeout(config.actionTimeoutMs);
    page.on('download', (download) => {
      this.pendingDownloads.push(
        this.saveDownload(download).catch((error: unknown) => {
          this.downloadErrors.push(errorMessage(error));
        }),
      );
    });
  }

  static async launch(options: PlaywrightControlOptions): Promise<PlaywrightBrowserControl> {
    const browser = await chromium.launch({
      headless: options.headless,
      executablePath: options.executablePath,
      args: ['--no-sandbox', '--disable-setuid-sandbox'],
    });
    const context = await browser.newContext({ acceptDownloads: true });
    const page = await context.newPage();
    return new PlaywrightBrowserControl(browser, page, options);
  }

  private async saveDownload(download: Download): Promise<void> {
    const name = download.suggestedFilename();
    const partial = join(this.config.downloadDir, `${name}.crdownload`);
    await download.saveAs(partial);
    await rename(partial, join(this.config.downloadDir, name));
  }

  async goto(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded' });
  }

  async content(): Promise<string> {
    return this.page.content();
  }

  async bodyText(): Promise<string> {
    return this.page.innerText('body');
  }

  async count(selector: string): Promise<number> {
    return this.page.locator(selector).count();
  }

  async textsOf(selector: string): Promise<string[]> {
    return this.page.locator(selector).allInnerTexts();
  }

  async scrollIntoView(selector: string): Promise<void> {
    await this.page.locator(selector).first().scrollIntoViewIfNeeded();
  }

  async click(selector: string): Promise<void> {
    await this.page.locator(selector).first().click();
  }

  async fill(selector: string, value: string): Promise<void> {
    await this.page.locator(selector).first().fill(value);
  }

  async isChecked(selector: string): Promise<boolean> {
    return this.page.locator(selector).first().isChecked();
  }

  async options(selector: string): Promise<DropdownOption[]> {
    const options = this.page.locator(selector).first().locator('option');
    const total = await options.count();
    const result: DropdownOption[] = [];
    for (let i = 0; i < total; i++) {
      const option = options.nth(i);
      const text = (await option.textContent()) ?? '';
      const value = (await option.getAttribute('value')) ?? text;
      result.push({ value: value.trim(), text: text.trim() });
    }
    return result;
  }

  async selectOption(selector: string, value: string): Promise<void> {
    await this.page.locator(selector).first().selectOption({ value });
  }

  async evaluate(script: string): Promise<unknown> {
    const result: unknown = await this.page.evaluate(script);
    return result;
  }

  /** The injected style and print media last only as long as the print. */
  async printToPdf(options: PdfOptions): Promise<Buffer> {
    const style = options.style ? await this.page.addStyleTag({ content: options.style }) : null;
    try {
      await this.page.emulateMedia({ media: 'print' });
      const margin = `${options.marginInches}in`;
      return await this.page.pdf({
        format: options.format,
        printBackground: options.printBackground,
        margin: { top: margin, right: margin, bottom: margin, left: margin },
      });
    } finally {
      await this.page.emulateMedia({ media: null });
      if (style) {
        await style.evaluate((node) => {
          node.parentNode?.removeChild(node);
        });
        await style.dispose();
      }
    }
  }

  private async settleDownloads(): Promise<void> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), this.config.downloadTimeoutMs);
    });
    try {
      const settled = await Promise.race([Promise.all(this.pendingDownloads).then(() => true), timedOut]);
      if (!settled) {
        this.downloadErrors.push(`still saving after ${this.config.downloadTimeoutMs}ms`);
      }
    } finally {
      clearTimeout(timer);
    }
  }

  /** Waits a bounded time for downloads still being saved; reports any that failed once the browser is gone. */
  async close(): Promise<void> {
    await this.settleDownloads();
    await this.browser.close();
    if (this.downloadErrors.length > 0) {
      throw new Error(`download(s) failed: ${this.downloadErrors.join('; ')}`);
    }
  }
}
