import { z } from 'zod';
import type { FontsiftConfig } from '../types/config.js';
import { resolveConfig } from '../config.js';
import { FontsiftError } from '../errors.js';

export class CliUsageError extends FontsiftError {}

export const USAGE = `Usage: fontsift <url...> [options]

Options:
  --subset <glob>        font files to subset (repeatable)
  --family <list>        comma-separated font-family filter
  --spider-limit <n>     pages to visit in total, seeds included (0: seeds only)
  --whitelist <text>     characters always kept
  --output <dir>         directory for subset fonts (default: beside each font)
  --static <file.html>   analyse a local HTML file instead of a live page (repeatable)
  --timeout <ms>         navigation timeout
  --preset <name>        single | crawl | thorough
  --format <fmt>         woff2 | ttf
  --headed               show the browser window
  -h, --help             show this help`;

interface RawArgs {
  urls: string[];
  subset: string[];
  staticFiles: string[];
  family?: string;
  spiderLimit?: string;
  whitelist?: string;
  output?: string;
  timeout?: string;
  preset?: string;
  format?: string;
  headed: boolean;
  help: boolean;
}

const cliSchema = z
  .object({
    urls: z.array(z.string().url()),
    subset: z.array(z.string().min(1)),
    staticFiles: z.array(z.string().min(1)),
    family: z.string().optional(),
    spiderLimit: z.coerce.number().int().nonnegative().optional(),
    whitelist: z.string().optional(),
    output: z.string().min(1).optional(),
    timeout: z.coerce.number().int().positive().optional(),
    preset: z.enum(['single', 'crawl', 'thorough']).optional(),
    format: z.enum(['woff2', 'ttf']).optional(),
    headed: z.boolean(),
    help: z.boolean()
  })
  .refine((args) => args.help || args.urls.length > 0 || args.staticFiles.length > 0, {
    message: 'at least one URL or --static file is required'
  });

export type CliOptions = z.infer<typeof cliSchema>;

function readArgs(argv: string[]): RawArgs {
  const out: RawArgs = { urls: [], subset: [], staticFiles: [], headed: false, help: false };

  const value = (i: number): string => {
    const v = argv[i + 1];
    if (v === undefined || v.startsWith('--')) throw new CliUsageError(`missing value for ${argv[i]}`);
    return v;
  };

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === '--subset') out.subset.push(value(i++));
    else if (a === '--static') out.staticFiles.push(value(i++));
    else if (a === '--family') out.family = value(i++);
    else if (a === '--spider-limit') out.spiderLimit = value(i++);
    else if (a === '--whitelist') out.whitelist = value(i++);
    else if (a === '--output') out.output = value(i++);
    else if (a === '--timeout') out.timeout = value(i++);
    else if (a === '--preset') out.preset = value(i++);
    else if (a === '--format') out.format = value(i++);
    else if (a === '--headed') out.headed = true;
    else if (a === '-h' || a === '--help') out.help = true;
    else if (a.startsWith('-')) throw new CliUsageError(`unknown option ${a}`);
    else out.urls.push(a);
  }

  return out;
}

export function parseCliArgs(argv: string[]): CliOptions {
  const parsed = cliSchema.safeParse(readArgs(argv));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new CliUsageError(`${where}${issue.message}`);
  }
  return parsed.data;
}

/** Flags over the preset over the defaults. */
export function configFromCli(options: CliOptions): FontsiftConfig {
  return resolveConfig(
    {
      spiderLimit: options.spiderLimit,
      navigationTimeoutMs: options.timeout,
      headless: options.headed ? false : undefined,
      familyFilter: options.family,
      whitelist: options.whitelist,
      outputDir: options.output,
      subsetFormat: options.format
    },
    options.preset
  );
}
