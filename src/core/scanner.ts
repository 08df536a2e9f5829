import { lstatSync, readdirSync, realpathSync, statSync, type Stats } from 'node:fs';
import { basename, join } from 'node:path';
import type { DigestOptions, EntryKind, FsEntry, ScanResult, SkippedEntry, TreeNode } from '../types/index.js';
import type { VisibilityFilter } from './filter.js';
import { collectFiles } from './collector.js';

function kindOf(stats: Stats): EntryKind {
  if (stats.isDirectory()) return 'directory';
  if (stats.isFile()) return 'file';
  return 'other';
}

/**
 * Stats a directory entry. Symlinks are resolved only when they are to be
 * followed; an entry that cannot be stat'ed comes back with `readable: false`.
 */
export function statEntry(absPath: string, relPath: string, followSymlinks: boolean): FsEntry {
  const entry: FsEntry = {
    absolutePath: absPath,
    relativePath: relPath,
    kind: 'other',
    isSymlink: false,
    size: 0,
    readable: false,
  };

  try {
    const linkStats = lstatSync(absPath);
    entry.isSymlink = linkStats.isSymbolicLink();
    const stats = entry.isSymlink && followSymlinks ? statSync(absPath) : linkStats;
    entry.kind = kindOf(stats);
    entry.size = stats.size;
    entry.readable = true;
  } catch {
    // Left unreadable; the visibility filter drops it.
  }

  return entry;
}

function realpathOrNull(absPath: string): string | null {
  try {
    return realpathSync(absPath);
  } catch {
    return null;
  }
}

function listDirectory(absPath: string): string[] {
  try {
    return readdirSync(absPath);
  } catch {
    return [];
  }
}

/**
 * Walks the root once and returns the visible entries as a tree, along with
 * each rejected entry and the rule that rejected it. Directories that fail the
 * filter are never entered. With `followSymlinks`, a directory
 * that resolves to one of its own ancestors is listed but not descended.
 */
export function scanDirectory(options: DigestOptions, filter: VisibilityFilter): ScanResult {
  const root: TreeNode = {
    name: basename(options.rootDir),
    path: '',
    absolutePath: options.rootDir,
    isDir: true,
    isFile: false,
    children: [],
  };
  const skipped: SkippedEntry[] = [];

  const walk = (node: TreeNode, ancestors: ReadonlySet<string>): void => {
    const subdirs: TreeNode[] = [];

    for (const name of listDirectory(node.absolutePath)) {
      const absPath = join(node.absolutePath, name);
      const relPath = node.path ? `${node.path}/${name}` : name;
      const entry = statEntry(absPath, relPath, options.followSymlinks);

      const verdict = filter.check(entry);
      if (!verdict.passes) {
        skipped.push({ relativePath: relPath, reason: verdict.reason });
        continue;
      }

      const child: TreeNode = {
        name,
        path: relPath,
        absolutePath: absPath,
        isDir: entry.kind === 'directory',
        isFile: entry.kind === 'file',
        children: [],
      };
      node.children.push(child);
      if (child.isDir) subdirs.push(child);
    }

    for (const dir of subdirs) {
      if (!options.followSymlinks) {
        walk(dir, ancestors);
        continue;
      }
      const real = realpathOrNull(dir.absolutePath);
      if (real !== null && ancestors.has(real)) continue;
      walk(dir, real === null ? ancestors : new Set([...ancestors, real]));
    }
  };

  const rootReal = realpathOrNull(options.rootDir);
  walk(root, new Set(rootReal === null ? [] : [rootReal]));

  return { root, files: collectFiles(root), skipped };
}
