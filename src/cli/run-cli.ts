import { readFile } from 'node:fs/promises';
import type { FontsiftConfig, ScanProgress } from '../types/config.js';
import { UNIVERSAL_FAMILY } from '../types/glyphs.js';
import { GlyphSetAggregator } from '../glyphs/glyph-set-aggregator.js';
import { analyzeStatic } from '../css/static-analyzer.js';
import { scanSite } from '../crawl/scan-session.js';
import { encodeUnicodeRange } from '../unicode/unicode-range.js';
import { subsetFontFiles } from '../fonts/subset-output.js';
import { USAGE, configFromCli, parseCliArgs, type CliOptions } from './cli-args.js';

function logProgress(progress: ScanProgress): void {
  if (progress.stage === 'navigating') {
    console.error(`[${progress.visited}] ${progress.url ?? ''}`);
  } else if (progress.stage === 'complete') {
    console.error(`scanned ${progress.visited} page(s)`);
  }
}

async function collect(options: CliOptions, config: FontsiftConfig): Promise<GlyphSetAggregator> {
  const aggregate = new GlyphSetAggregator();

  for (const file of options.staticFiles) {
    const { charsPerFamily } = analyzeStatic(await readFile(file, 'utf8'));
    aggregate.merge(charsPerFamily);
    // Static analysis keeps no universal set of its own.
    for (const codepoints of charsPerFamily.values()) {
      aggregate.merge(new Map([[UNIVERSAL_FAMILY, codepoints]]));
    }
  }

  if (options.urls.length > 0) {
    const scanned = await scanSite(options.urls, config.spiderLimit, {
      navigationTimeoutMs: config.navigationTimeoutMs,
      waitUntil: config.waitUntil,
      headless: config.headless,
      onProgress: logProgress
    });
    aggregate.merge(scanned);
  }

  if (config.whitelist) aggregate.addWhitelist(config.whitelist);
  return aggregate;
}

/**
 * Runs the command line and returns the exit code: 0 on success, 1 when the
 * scan failed or any font could not be subset.
 */
export async function runCli(argv: string[]): Promise<number> {
  const options = parseCliArgs(argv);
  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const config = configFromCli(options);
  const codepoints = (await collect(options, config)).select(config.familyFilter);

  if (options.subset.length === 0) {
    console.log(encodeUnicodeRange(codepoints));
    return 0;
  }

  const results = await subsetFontFiles(options.subset, codepoints, {
    outputDir: config.outputDir,
    format: config.subsetFormat
  });
  if (results.length === 0) {
    console.error(`no font files matched ${options.subset.join(', ')}`);
    return 1;
  }

  let failed = 0;
  for (const result of results) {
    if (result.ok) {
      console.log(`${result.outputPath} (${result.glyphCount} glyphs, ${result.bytes} bytes)`);
    } else {
      failed++;
      console.error(result.error.message);
    }
  }
  return failed > 0 ? 1 : 0;
}
