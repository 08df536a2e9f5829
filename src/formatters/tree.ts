import type { TreeNode } from '../types/index.js';
import { GLYPH_CHILD, GLYPH_LAST, GLYPH_PIPE, GLYPH_SPACE } from '../constants/defaults.js';

// Everything that is not a regular file (directories, pipes, sockets, devices)
// sorts ahead of regular files, then by case-insensitive name. Array#sort is
// stable, so names equal after lowercasing keep their enumeration order.
export function sortForDisplay(nodes: readonly TreeNode[]): TreeNode[] {
  return [...nodes].sort((a, b) => {
    if (a.isFile !== b.isFile) return a.isFile ? 1 : -1;
    const aName = a.name.toLowerCase();
    const bName = b.name.toLowerCase();
    if (aName < bName) return -1;
    if (aName > bName) return 1;
    return 0;
  });
}

function formatTree(nodes: readonly TreeNode[], lines: string[], prefix: string): void {
  const sorted = sortForDisplay(nodes);

  for (let i = 0; i < sorted.length; i++) {
    const node = sorted[i];
    if (node === undefined) continue;
    const isLast = i === sorted.length - 1;
    const connector = isLast ? GLYPH_LAST : GLYPH_CHILD;

    if (node.isDir) {
      lines.push(`${prefix}${connector} ${node.name}/`);
      formatTree(node.children, lines, prefix + (isLast ? GLYPH_SPACE : GLYPH_PIPE));
    } else {
      lines.push(`${prefix}${connector} ${node.name}`);
    }
  }
}

export function renderTree(root: TreeNode): string[] {
  const lines = [`${root.name}/`];
  formatTree(root.children, lines, '');
  return lines;
}
