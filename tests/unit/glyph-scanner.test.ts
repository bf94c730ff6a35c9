// @vitest-environment node
import { describe, it, expect } from 'vitest';
import { extractGlyphs, extractLinks } from '../../src/browser/glyph-scanner.js';
import { ScriptEvaluationError } from '../../src/errors.js';
import { FakePage } from '../helpers/fake-browser.js';

const URL_A = 'https://site.test/a';

describe('extractGlyphs', () => {
  it('should return a well-formed glyph mapping', async () => {
    const page = new FakePage(URL_A, { glyphs: { Inter: [65, 0x1f600], '*': [65, 0x1f600] } });
    await expect(extractGlyphs(page)).resolves.toEqual({ Inter: [65, 0x1f600], '*': [65, 0x1f600] });
  });

  it('should reject codepoints outside the Unicode range', async () => {
    const page = new FakePage(URL_A, { glyphs: { Inter: [0x110000] } });
    await expect(extractGlyphs(page)).rejects.toThrow(/unexpected result shape: Inter\.0/);
  });

  it('should reject results that are not a mapping', async () => {
    const page = new FakePage(URL_A, { glyphs: [1, 2] });
    await expect(extractGlyphs(page)).rejects.toBeInstanceOf(ScriptEvaluationError);
  });

  it('should wrap errors thrown by the page script', async () => {
    const page = new FakePage(URL_A, { glyphError: 'ReferenceError: x is not defined' });

    const error = await extractGlyphs(page).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ScriptEvaluationError);
    expect(error).toMatchObject({
      url: URL_A,
      script: 'glyphs',
      message: `Failed to run glyphs script on ${URL_A}: ReferenceError: x is not defined`
    });
  });
});

describe('extractLinks', () => {
  it('should return the page URL and its hrefs', async () => {
    const page = new FakePage(URL_A, { links: ['https://site.test/b'] });
    await expect(extractLinks(page)).resolves.toEqual({ pageUrl: URL_A, hrefs: ['https://site.test/b'] });
  });

  it('should reject a malformed link result', async () => {
    const page = new FakePage(URL_A, { linksResult: { pageUrl: URL_A, hrefs: [1] } });
    await expect(extractLinks(page)).rejects.toThrow(`Failed to run links script on ${URL_A}: unexpected result shape`);
  });
});
