import type { DigestOptions, FilterResult, FsEntry } from '../types/index.js';
import type { IgnoreMatcher } from './ignore.js';

const PASS: FilterResult = { passes: true, reason: '' };

export interface FilterRule {
  check(entry: FsEntry): FilterResult;
}

export function isHiddenPath(relPath: string): boolean {
  return relPath
    .split('/')
    .some((part) => part !== '.' && part !== '..' && part.startsWith('.'));
}

class HiddenRule implements FilterRule {
  check(entry: FsEntry): FilterResult {
    if (isHiddenPath(entry.relativePath)) {
      return { passes: false, reason: 'Hidden entry' };
    }
    return PASS;
  }
}

class IgnoreRule implements FilterRule {
  constructor(private readonly matcher: IgnoreMatcher) {}

  check(entry: FsEntry): FilterResult {
    if (this.matcher.matches(entry.relativePath, entry.kind === 'directory')) {
      return { passes: false, reason: 'Matched ignore pattern' };
    }
    return PASS;
  }
}

class SizeRule implements FilterRule {
  constructor(private readonly maxBytes: number) {}

  check(entry: FsEntry): FilterResult {
    if (entry.kind === 'file' && entry.size > this.maxBytes) {
      return { passes: false, reason: `Too large: ${entry.size.toLocaleString()} > ${this.maxBytes.toLocaleString()}` };
    }
    return PASS;
  }
}

class SymlinkRule implements FilterRule {
  check(entry: FsEntry): FilterResult {
    if (entry.isSymlink) {
      return { passes: false, reason: 'Symlink not followed' };
    }
    return PASS;
  }
}

class StatRule implements FilterRule {
  check(entry: FsEntry): FilterResult {
    if (!entry.readable) {
      return { passes: false, reason: 'Cannot stat entry' };
    }
    return PASS;
  }
}

/**
 * Decides, per file or directory, whether it belongs in the digest. The first
 * failing rule wins: hidden, ignore pattern, size limit, symlink, stat.
 */
export class VisibilityFilter {
  private readonly rules: FilterRule[];

  constructor(options: DigestOptions, matcher: IgnoreMatcher) {
    this.rules = [];

    if (!options.includeHidden) {
      this.rules.push(new HiddenRule());
    }

    this.rules.push(new IgnoreRule(matcher), new SizeRule(options.maxFileSize));

    if (!options.followSymlinks) {
      this.rules.push(new SymlinkRule());
    }

    this.rules.push(new StatRule());
  }

  check(entry: FsEntry): FilterResult {
    for (const rule of this.rules) {
      const result = rule.check(entry);
      if (!result.passes) {
        return result;
      }
    }
    return { passes: true, reason: 'Passed all filters' };
  }
}
