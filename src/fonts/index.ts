export { detectFontFormat, withTrueTypeVersion } from './font-format.js';
export { subsetFont, type SubsetFontResult } from './font-subsetter.js';
export { subsetFontFiles, subsetOutputPath, expandFontPatterns, type SubsetFilesOptions } from './subset-output.js';
