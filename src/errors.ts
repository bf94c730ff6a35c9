import type { FontSubsetFailure } from './types/fonts.js';

export class FontsiftError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A page failed to load, or did not finish loading within the timeout. */
export class NavigationError extends FontsiftError {
  readonly url: string;

  constructor(url: string, cause?: unknown) {
    super(`Failed to navigate to ${url}: ${describeError(cause)}`, { cause });
    this.url = url;
  }
}

/** The in-page extraction threw, or handed back something of the wrong shape. */
export class ScriptEvaluationError extends FontsiftError {
  readonly url: string;
  readonly script: 'glyphs' | 'links';

  constructor(url: string, script: 'glyphs' | 'links', cause?: unknown) {
    super(`Failed to run ${script} script on ${url}: ${describeError(cause)}`, { cause });
    this.url = url;
    this.script = script;
  }
}

const FAILURE_LABELS: Record<FontSubsetFailure, string> = {
  parse: 'failed to parse font',
  subset: 'failed to subset font',
  compress: 'failed to compress to WOFF2'
};

export class FontSubsetError extends FontsiftError {
  readonly kind: FontSubsetFailure;
  readonly detail: string;
  readonly fontPath?: string;

  constructor(kind: FontSubsetFailure, detail: string, options: { fontPath?: string; cause?: unknown } = {}) {
    const where = options.fontPath ? ` (${options.fontPath})` : '';
    super(`${FAILURE_LABELS[kind]}${where}: ${detail}`, { cause: options.cause });
    this.kind = kind;
    this.detail = detail;
    this.fontPath = options.fontPath;
  }

  /** Same failure, reported against the file it came from. */
  withPath(fontPath: string): FontSubsetError {
    return new FontSubsetError(this.kind, this.detail, { fontPath, cause: this.cause });
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (error === undefined) return 'unknown error';
  return String(error);
}
