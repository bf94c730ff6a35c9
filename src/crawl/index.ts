export { CrawlFrontier, discoverLinks, normalizeUrl, type FrontierEntry } from './crawl-frontier.js';
export { ScanSession, scanSite, type ScanSiteOptions } from './scan-session.js';
