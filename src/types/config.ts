import type { WaitUntil } from './browser.js';
import type { SubsetOutputFormat } from './fonts.js';

export interface FontsiftConfig {
  // Crawl
  spiderLimit: number;
  navigationTimeoutMs: number;
  waitUntil: WaitUntil;
  headless: boolean;

  // Selection
  familyFilter?: string;
  whitelist?: string;

  // Output
  outputDir?: string;
  subsetFormat: SubsetOutputFormat;
}

export interface ScanProgress {
  stage: 'navigating' | 'extracting' | 'spidering' | 'skipped' | 'complete';
  url?: string;
  visited: number;
  queued: number;
  message?: string;
}

export type ProgressCallback = (progress: ScanProgress) => void;

export interface ScanOptions {
  navigationTimeoutMs?: number;
  waitUntil?: WaitUntil;
  onProgress?: ProgressCallback;
}
