import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import ignore, { type Ignore } from 'ignore';
import type { DigestOptions } from '../types/index.js';
import { GlobalIgnores, Presets } from '../constants/defaults.js';

/**
 * Gitignore-dialect matcher over repository-relative paths.
 *
 * Patterns are applied in the order given, so later patterns (including
 * `!negations`) override earlier ones. Directory-only patterns such as
 * `build/` only match candidates tested with `isDirectory = true`.
 */
export class IgnoreMatcher {
  readonly patterns: readonly string[];
  private readonly ig: Ignore;

  constructor(patterns: readonly string[]) {
    this.patterns = Object.freeze([...patterns]);
    this.ig = ignore({ allowRelativePaths: true }).add([...this.patterns]);
  }

  matches(relativePath: string, isDirectory: boolean): boolean {
    const normalized = relativePath.replace(/^\/+/, '').replace(/\/+$/, '');
    if (!normalized) return false;
    return this.ig.ignores(isDirectory ? `${normalized}/` : normalized);
  }
}

export function loadGitignore(path: string): string[] {
  if (!existsSync(path)) {
    return [];
  }

  try {
    return readFileSync(path, 'utf-8')
      .split(/\r?\n/)
      .filter((line) => line.trim() !== '');
  } catch {
    return [];
  }
}

function gitignorePatterns(options: DigestOptions): string[] {
  switch (options.gitignore.mode) {
    case 'none':
      return [];
    case 'file':
      return loadGitignore(options.gitignore.path);
    case 'auto':
      return loadGitignore(join(options.rootDir, '.gitignore'));
  }
}

/**
 * Assembles the pattern set in precedence order: built-in ignores, preset,
 * gitignore file, then the caller's extra patterns.
 */
export function collectIgnorePatterns(options: DigestOptions): string[] {
  return [
    ...GlobalIgnores,
    ...(options.preset ? Presets[options.preset] : []),
    ...gitignorePatterns(options),
    ...options.extraIgnores,
  ];
}

export function buildIgnoreMatcher(options: DigestOptions): IgnoreMatcher {
  return new IgnoreMatcher(collectIgnorePatterns(options));
}
