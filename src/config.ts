import type { FontsiftConfig } from './types/config.js';

export const DEFAULT_CONFIG: FontsiftConfig = {
  spiderLimit: 0,
  navigationTimeoutMs: 30_000,
  waitUntil: 'load',
  headless: true,
  subsetFormat: 'woff2'
};

// Convenience configuration presets
export const ConfigPresets = {
  /**
   * Only the given pages, no link following
   */
  single: {
    spiderLimit: 0
  },

  /**
   * Follow same-origin links for a small site
   */
  crawl: {
    spiderLimit: 25
  },

  /**
   * Larger crawl that waits for the network to settle, for pages that
   * render text from script after load
   */
  thorough: {
    spiderLimit: 200,
    waitUntil: 'networkidle',
    navigationTimeoutMs: 60_000
  }
} satisfies Record<string, Partial<FontsiftConfig>>;

export type ConfigPreset = keyof typeof ConfigPresets;

/** Defaults, then the preset if any, then explicit overrides. */
export function resolveConfig(overrides: Partial<FontsiftConfig> = {}, preset?: ConfigPreset): FontsiftConfig {
  if (preset !== undefined && !(preset in ConfigPresets)) {
    throw new Error(`Unknown preset: ${String(preset)}. Available presets: ${Object.keys(ConfigPresets).join(', ')}`);
  }

  const base: FontsiftConfig = { ...DEFAULT_CONFIG, ...(preset ? ConfigPresets[preset] : {}) };

  return {
    spiderLimit: overrides.spiderLimit ?? base.spiderLimit,
    navigationTimeoutMs: overrides.navigationTimeoutMs ?? base.navigationTimeoutMs,
    waitUntil: overrides.waitUntil ?? base.waitUntil,
    headless: overrides.headless ?? base.headless,
    familyFilter: overrides.familyFilter ?? base.familyFilter,
    whitelist: overrides.whitelist ?? base.whitelist,
    outputDir: overrides.outputDir ?? base.outputDir,
    subsetFormat: overrides.subsetFormat ?? base.subsetFormat
  };
}
