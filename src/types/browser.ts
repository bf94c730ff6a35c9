export type WaitUntil = 'load' | 'domcontentloaded' | 'networkidle' | 'commit';

export interface OpenPageOptions {
  timeoutMs: number;
  waitUntil: WaitUntil;
}

/**
 * A loaded page. `evaluate` runs a self-contained function inside the page
 * and resolves to its JSON-serialisable result.
 */
export interface BrowserPage {
  url(): string;
  evaluate<R>(pageFunction: () => R): Promise<unknown>;
  close(): Promise<void>;
}

export interface BrowserDriver {
  open(url: string, options: OpenPageOptions): Promise<BrowserPage>;
  close(): Promise<void>;
}
