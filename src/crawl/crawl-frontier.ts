export interface FrontierEntry {
  /** URL to navigate to: a seed as given, a discovered link normalized. */
  url: string;
  /** Normalized form, used for deduplication only. */
  key: string;
  /** Seeds are always visited; discovered links only while the budget lasts. */
  seed: boolean;
}

/**
 * Canonical form used for deduplication: no fragment, no trailing slash on
 * non-root paths, query parameters sorted by name. Strings that are not
 * absolute URLs come back unchanged.
 */
export function normalizeUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }

  if (parsed.pathname !== '/' && parsed.pathname.endsWith('/')) {
    parsed.pathname = parsed.pathname.slice(0, -1);
  }
  parsed.hash = '';
  parsed.searchParams.sort();

  return parsed.toString();
}

function originOf(url: string): string | null {
  try {
    const origin = new URL(url).origin;
    return origin === 'null' ? null : origin;
  } catch {
    return null;
  }
}

/**
 * Same-origin links of a page, normalized, deduplicated in first-seen
 * order. `limit` caps how many come back; 0 means no cap.
 */
export function discoverLinks(pageUrl: string, hrefs: string[], limit: number = 0): string[] {
  const origin = originOf(pageUrl);
  if (!origin) return [];

  const seen = new Set<string>();
  const out: string[] = [];

  for (const href of hrefs) {
    if (originOf(href) !== origin) continue;
    const normalized = normalizeUrl(href);
    if (seen.has(normalized)) continue;
    seen.add(normalized);
    out.push(normalized);
    if (limit > 0 && out.length >= limit) break;
  }

  return out;
}

/**
 * Crawl state for one session: normalized visited set plus a LIFO stack of
 * pending URLs, which makes the traversal depth-first. Both only grow or
 * drain for the life of the session.
 */
export class CrawlFrontier {
  private readonly visited = new Set<string>();
  private readonly pending: FrontierEntry[] = [];

  /**
   * @param spiderLimit total pages the session may visit, seeds included;
   *   0 turns link discovery off and only seeds are visited.
   */
  constructor(readonly spiderLimit: number = 0) {}

  get visitedCount(): number {
    return this.visited.size;
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  visitedUrls(): string[] {
    return Array.from(this.visited);
  }

  hasVisited(url: string): boolean {
    return this.visited.has(normalizeUrl(url));
  }

  addSeeds(urls: string[]): void {
    for (const url of urls) this.pending.push({ url, key: normalizeUrl(url), seed: true });
  }

  /** Links still worth discovering from the current page, or 0 when spidering is over. */
  remainingBudget(): number {
    if (this.spiderLimit <= 0) return 0;
    return Math.max(0, this.spiderLimit - this.visited.size);
  }

  /**
   * Queues links found on `pageUrl`, capped by the remaining budget.
   * Returns the URLs actually queued.
   */
  discover(pageUrl: string, hrefs: string[]): string[] {
    const budget = this.remainingBudget();
    if (budget === 0) return [];

    const queued: string[] = [];
    for (const url of discoverLinks(pageUrl, hrefs, budget)) {
      if (this.visited.has(url)) continue;
      this.pending.push({ url, key: url, seed: false });
      queued.push(url);
    }
    return queued;
  }

  /**
   * Pops the next URL to visit and marks it visited. Already-visited URLs
   * are skipped, and discovered links are dropped once the budget is spent.
   */
  next(): FrontierEntry | undefined {
    for (let entry = this.pending.pop(); entry; entry = this.pending.pop()) {
      if (this.visited.has(entry.key)) continue;
      if (!entry.seed && this.remainingBudget() === 0) continue;
      this.visited.add(entry.key);
      return entry;
    }
    return undefined;
  }
}
