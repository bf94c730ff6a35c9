import type { BrowserDriver, BrowserPage, WaitUntil } from '../types/browser.js';
import type { ProgressCallback, ScanOptions, ScanProgress } from '../types/config.js';
import type { FamilyCodepoints } from '../types/glyphs.js';
import { GlyphSetAggregator } from '../glyphs/glyph-set-aggregator.js';
import { extractGlyphs, extractLinks } from '../browser/glyph-scanner.js';
import { PlaywrightDriver, type PlaywrightDriverOptions } from '../browser/playwright-driver.js';
import { DEFAULT_CONFIG } from '../config.js';
import { describeError } from '../errors.js';
import { CrawlFrontier, type FrontierEntry } from './crawl-frontier.js';

interface ResolvedScanOptions {
  navigationTimeoutMs: number;
  waitUntil: WaitUntil;
  onProgress?: ProgressCallback;
}

/**
 * One crawl over a browser: owns the frontier and the glyph aggregate, and
 * visits pages strictly one after another.
 *
 * A page that fails to load or to evaluate is skipped with a warning. The
 * failure is rethrown only when that page is the single seed of the session,
 * since there is then nothing left to scan.
 */
export class ScanSession {
  readonly aggregate: GlyphSetAggregator;
  readonly frontier: CrawlFrontier;
  private readonly soleSeed: boolean;
  private readonly options: ResolvedScanOptions;

  constructor(
    private driver: BrowserDriver,
    seedUrls: string[],
    spiderLimit: number,
    options: ScanOptions = {},
    aggregate: GlyphSetAggregator = new GlyphSetAggregator()
  ) {
    this.aggregate = aggregate;
    this.frontier = new CrawlFrontier(spiderLimit);
    this.frontier.addSeeds(seedUrls);
    this.soleSeed = seedUrls.length === 1;
    this.options = {
      navigationTimeoutMs: options.navigationTimeoutMs ?? DEFAULT_CONFIG.navigationTimeoutMs,
      waitUntil: options.waitUntil ?? DEFAULT_CONFIG.waitUntil,
      onProgress: options.onProgress
    };
  }

  async run(): Promise<GlyphSetAggregator> {
    for (let entry = this.frontier.next(); entry; entry = this.frontier.next()) {
      await this.visit(entry);
    }
    this.report({ stage: 'complete' });
    return this.aggregate;
  }

  private async visit(entry: FrontierEntry): Promise<void> {
    this.report({ stage: 'navigating', url: entry.url });

    let page: BrowserPage;
    try {
      page = await this.driver.open(entry.url, {
        timeoutMs: this.options.navigationTimeoutMs,
        waitUntil: this.options.waitUntil
      });
    } catch (error) {
      this.skip(entry, error);
      return;
    }

    try {
      this.report({ stage: 'extracting', url: entry.url });
      const glyphs = await extractGlyphs(page, entry.url);
      this.aggregate.merge(glyphs);

      if (this.frontier.remainingBudget() > 0) {
        await this.spider(page, entry.url);
      }
    } catch (error) {
      this.skip(entry, error);
    } finally {
      await this.closePage(page, entry.url);
    }
  }

  /** Link discovery failures only cost the links of that page. */
  private async spider(page: BrowserPage, url: string): Promise<void> {
    try {
      const { pageUrl, hrefs } = await extractLinks(page, url);
      const queued = this.frontier.discover(pageUrl, hrefs);
      this.report({ stage: 'spidering', url, message: `queued ${queued.length} link(s)` });
    } catch (error) {
      console.warn(`ScanSession: link discovery failed on ${url}: ${describeError(error)}`);
    }
  }

  private skip(entry: FrontierEntry, error: unknown): void {
    if (entry.seed && this.soleSeed) throw error;
    console.warn(`ScanSession: skipping ${entry.url}: ${describeError(error)}`);
    this.report({ stage: 'skipped', url: entry.url, message: describeError(error) });
  }

  private async closePage(page: BrowserPage, url: string): Promise<void> {
    try {
      await page.close();
    } catch (error) {
      console.warn(`ScanSession: failed to close ${url}: ${describeError(error)}`);
    }
  }

  private report(progress: Omit<ScanProgress, 'visited' | 'queued'>): void {
    this.options.onProgress?.({
      ...progress,
      visited: this.frontier.visitedCount,
      queued: this.frontier.pendingCount
    });
  }
}

export interface ScanSiteOptions extends ScanOptions, PlaywrightDriverOptions {
  /** Drive this browser instead of launching Chromium; it is left open. */
  driver?: BrowserDriver;
}

/**
 * Scans the seed pages, following same-origin links while fewer than
 * `spiderLimit` pages have been visited (0: seeds only), and returns the
 * codepoints seen per font-family plus the `"*"` union.
 */
export async function scanSite(
  seedUrls: string[],
  spiderLimit: number,
  options: ScanSiteOptions = {}
): Promise<FamilyCodepoints> {
  const ownsDriver = !options.driver;
  const driver = options.driver ?? (await PlaywrightDriver.launch(options));

  try {
    const session = new ScanSession(driver, seedUrls, spiderLimit, options);
    const aggregate = await session.run();
    return aggregate.toMap();
  } finally {
    if (ownsDriver) await driver.close();
  }
}
