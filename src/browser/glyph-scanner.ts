import { z } from 'zod';
import type { BrowserPage } from '../types/browser.js';
import type { GlyphSetsPayload } from '../types/glyphs.js';
import { ScriptEvaluationError } from '../errors.js';
import { collectPageGlyphs, collectPageLinks, type PageLinks } from './page-scripts.js';

const glyphSetsSchema = z.record(z.string(), z.array(z.number().int().nonnegative().max(0x10ffff)));

const pageLinksSchema = z.object({
  pageUrl: z.string(),
  hrefs: z.array(z.string())
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

async function evaluateOn(page: BrowserPage, url: string, script: 'glyphs' | 'links', fn: () => unknown): Promise<unknown> {
  try {
    return await page.evaluate(fn);
  } catch (error) {
    throw new ScriptEvaluationError(url, script, error);
  }
}

/**
 * Runs the glyph extraction once on a loaded page and checks the result is
 * a family -> codepoints mapping.
 */
export async function extractGlyphs(page: BrowserPage, url: string = page.url()): Promise<GlyphSetsPayload> {
  const raw = await evaluateOn(page, url, 'glyphs', collectPageGlyphs);
  const parsed = glyphSetsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ScriptEvaluationError(url, 'glyphs', new Error(`unexpected result shape: ${describeIssues(parsed.error)}`));
  }
  return parsed.data;
}

/** Anchors of a loaded page, as resolved absolute URLs. */
export async function extractLinks(page: BrowserPage, url: string = page.url()): Promise<PageLinks> {
  const raw = await evaluateOn(page, url, 'links', collectPageLinks);
  const parsed = pageLinksSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ScriptEvaluationError(url, 'links', new Error(`unexpected result shape: ${describeIssues(parsed.error)}`));
  }
  return parsed.data;
}
