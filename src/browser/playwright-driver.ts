import { chromium, type Browser, type Page } from 'playwright-core';
import type { BrowserDriver, BrowserPage, OpenPageOptions } from '../types/browser.js';
import { NavigationError, describeError } from '../errors.js';

export interface PlaywrightDriverOptions {
  headless?: boolean;
  /** Installed browser to drive instead of a Playwright download, e.g. `chrome`. */
  channel?: string;
  executablePath?: string;
}

class PlaywrightPage implements BrowserPage {
  constructor(private page: Page) {}

  url(): string {
    return this.page.url();
  }

  evaluate<R>(pageFunction: () => R): Promise<unknown> {
    return this.page.evaluate(pageFunction);
  }

  close(): Promise<void> {
    return this.page.close();
  }
}

/** `BrowserDriver` over a single Chromium instance, one tab per page. */
export class PlaywrightDriver implements BrowserDriver {
  private constructor(private browser: Browser) {}

  static async launch(options: PlaywrightDriverOptions = {}): Promise<PlaywrightDriver> {
    const browser = await chromium.launch({
      headless: options.headless ?? true,
      channel: options.channel,
      executablePath: options.executablePath
    });
    return new PlaywrightDriver(browser);
  }

  async open(url: string, options: OpenPageOptions): Promise<BrowserPage> {
    const page = await this.browser.newPage();
    try {
      await page.goto(url, { timeout: options.timeoutMs, waitUntil: options.waitUntil });
    } catch (error) {
      await page.close().catch((closeError: unknown) => {
        console.warn(`PlaywrightDriver: failed to close tab for ${url}: ${describeError(closeError)}`);
      });
      throw new NavigationError(url, error);
    }
    return new PlaywrightPage(page);
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}
