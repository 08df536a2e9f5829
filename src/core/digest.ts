import type { Digest, DigestOptions, OutputFormat, ScanResult } from '../types/index.js';
import { buildIgnoreMatcher } from './ignore.js';
import { VisibilityFilter } from './filter.js';
import { scanDirectory } from './scanner.js';
import { readFiles } from './reader.js';
import { renderTree } from '../formatters/tree.js';
import { formatMarkdown } from '../formatters/markdown.js';
import { formatPlain } from '../formatters/plain.js';

export function scanRepository(options: DigestOptions): ScanResult {
  const matcher = buildIgnoreMatcher(options);
  const filter = new VisibilityFilter(options, matcher);
  return scanDirectory(options, filter);
}

export function assembleDigest(options: DigestOptions, now: Date = new Date()): Digest {
  const scan = scanRepository(options);

  return {
    rootDir: options.rootDir,
    generatedAt: now,
    treeLines: renderTree(scan.root),
    files: readFiles(scan.files, options),
    skipped: scan.skipped,
  };
}

/**
 * Builds the whole document for `options`. The tree and the file sections
 * come from one traversal, so every file leaf in the tree has a section.
 */
export function buildDigest(options: DigestOptions, now: Date = new Date()): string {
  return renderDigest(assembleDigest(options, now), options.format);
}

export function renderDigest(digest: Digest, format: OutputFormat): string {
  return format === 'plain' ? formatPlain(digest) : formatMarkdown(digest);
}
