// @vitest-environment node
import { describe, it, expect } from 'vitest';
import { CrawlFrontier, discoverLinks, normalizeUrl } from '../../src/crawl/crawl-frontier.js';

function drain(frontier: CrawlFrontier): string[] {
  const out: string[] = [];
  for (let entry = frontier.next(); entry; entry = frontier.next()) out.push(entry.url);
  return out;
}

describe('normalizeUrl', () => {
  it('should drop the fragment, the trailing slash and sort the query', () => {
    expect(normalizeUrl('https://a.test/path/?b=2&a=1#frag')).toBe('https://a.test/path?a=1&b=2');
  });

  it('should keep the root path', () => {
    expect(normalizeUrl('https://a.test/')).toBe('https://a.test/');
    expect(normalizeUrl('https://a.test')).toBe('https://a.test/');
  });

  it('should return strings that are not URLs unchanged', () => {
    expect(normalizeUrl('not a url')).toBe('not a url');
  });
});

describe('discoverLinks', () => {
  const hrefs = [
    'https://a.test/x',
    'https://a.test/x/',
    'https://other.test/y',
    'https://a.test/x?b=2&a=1',
    'mailto:me@a.test',
    'https://a.test/x#top',
    'http://a.test/x'
  ];

  it('should keep same-origin links, normalised and deduplicated in order', () => {
    expect(discoverLinks('https://a.test/', hrefs)).toEqual(['https://a.test/x', 'https://a.test/x?a=1&b=2']);
  });

  it('should merge reordered queries, drop fragments and other origins', () => {
    expect(
      discoverLinks('https://a/', ['https://a/x#frag', 'https://a/x?b=2&a=1', 'https://a/x?a=1&b=2', 'https://other/y'])
    ).toEqual(['https://a/x', 'https://a/x?a=1&b=2']);
  });

  it('should stop at the limit', () => {
    expect(discoverLinks('https://a.test/', hrefs, 1)).toEqual(['https://a.test/x']);
  });

  it('should find nothing from a page without an origin', () => {
    expect(discoverLinks('about:blank', hrefs)).toEqual([]);
  });
});

describe('CrawlFrontier', () => {
  it('should hand out seeds last-in first-out', () => {
    const frontier = new CrawlFrontier();
    frontier.addSeeds(['https://a.test/1', 'https://a.test/2']);

    expect(drain(frontier)).toEqual(['https://a.test/2', 'https://a.test/1']);
    expect(frontier.visitedCount).toBe(2);
  });

  it('should visit equivalent seeds once', () => {
    const frontier = new CrawlFrontier();
    frontier.addSeeds(['https://a.test/x', 'https://a.test/x/#intro']);

    expect(drain(frontier)).toEqual(['https://a.test/x/#intro']);
    expect(frontier.visitedUrls()).toEqual(['https://a.test/x']);
  });

  it('should hand out seeds as given and dedupe them by their normalized form', () => {
    const frontier = new CrawlFrontier(5);
    frontier.addSeeds(['https://a.test/docs/?b=1&a=2']);

    expect(frontier.next()).toEqual({ url: 'https://a.test/docs/?b=1&a=2', key: 'https://a.test/docs?a=2&b=1', seed: true });
    expect(frontier.hasVisited('https://a.test/docs?a=2&b=1')).toBe(true);
    expect(frontier.discover('https://a.test/docs/?b=1&a=2', ['https://a.test/docs?a=2&b=1', 'https://a.test/docs/?a=2&b=1#x'])).toEqual([]);
  });

  it('should not discover anything when spidering is off', () => {
    const frontier = new CrawlFrontier(0);
    frontier.addSeeds(['https://a.test/']);
    frontier.next();

    expect(frontier.remainingBudget()).toBe(0);
    expect(frontier.discover('https://a.test/', ['https://a.test/a'])).toEqual([]);
    expect(frontier.next()).toBeUndefined();
  });

  it('should cap discovered links by the remaining budget', () => {
    const frontier = new CrawlFrontier(3);
    frontier.addSeeds(['https://a.test/']);
    frontier.next();

    expect(frontier.remainingBudget()).toBe(2);
    expect(
      frontier.discover('https://a.test/', ['https://a.test/a', 'https://a.test/b', 'https://a.test/c'])
    ).toEqual(['https://a.test/a', 'https://a.test/b']);
    expect(drain(frontier)).toEqual(['https://a.test/b', 'https://a.test/a']);
    expect(frontier.visitedCount).toBe(3);
  });

  it('should not queue pages already visited', () => {
    const frontier = new CrawlFrontier(5);
    frontier.addSeeds(['https://a.test/']);
    frontier.next();

    expect(frontier.discover('https://a.test/', ['https://a.test/#top', 'https://a.test/a'])).toEqual(['https://a.test/a']);
    expect(frontier.hasVisited('https://a.test')).toBe(true);
  });

  it('should always visit seeds, even once the budget is spent', () => {
    const frontier = new CrawlFrontier(3);
    frontier.addSeeds(['https://a.test/s1', 'https://a.test/s2']);

    expect(frontier.next()?.url).toBe('https://a.test/s2');
    frontier.discover('https://a.test/s2', ['https://a.test/a', 'https://a.test/b']);

    expect(drain(frontier)).toEqual(['https://a.test/b', 'https://a.test/a', 'https://a.test/s1']);
    expect(frontier.visitedCount).toBe(4);
  });

  it('should drop discovered links once the budget runs out', () => {
    const frontier = new CrawlFrontier(2);
    frontier.addSeeds(['https://a.test/']);
    frontier.next();
    frontier.discover('https://a.test/', ['https://a.test/a']);
    expect(frontier.next()?.url).toBe('https://a.test/a');
    expect(frontier.remainingBudget()).toBe(0);
    expect(frontier.discover('https://a.test/a', ['https://a.test/b'])).toEqual([]);
    expect(frontier.next()).toBeUndefined();
  });
});
