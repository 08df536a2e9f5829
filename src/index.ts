export type {
  CLIOptions,
  Digest,
  DigestOptions,
  FileContent,
  GitignoreSource,
  OutputFormat,
  PresetName,
  ScanResult,
  SkippedEntry,
  TreeNode,
  VisibleFile,
} from './types/index.js';
export { buildDigest, assembleDigest, renderDigest, scanRepository } from './core/digest.js';
export { buildOptions, getDefaultOptions, parseSize } from './config/builder.js';
export { IgnoreMatcher, buildIgnoreMatcher, collectIgnorePatterns } from './core/ignore.js';
export { VisibilityFilter } from './core/filter.js';
export { isProbablyBinary } from './core/binary.js';
export { renderTree } from './formatters/tree.js';
export { ConfigurationError, InvalidSizeError } from './core/errors.js';
