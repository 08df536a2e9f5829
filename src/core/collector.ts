import type { TreeNode, VisibleFile } from '../types/index.js';

/**
 * Flattens the scanned tree into walk order: a directory's files in the order
 * they were enumerated, then each subdirectory in turn. This is not the sorted
 * order of the rendered tree.
 */
export function collectFiles(root: TreeNode): VisibleFile[] {
  const files: VisibleFile[] = [];

  const visit = (node: TreeNode): void => {
    for (const child of node.children) {
      if (!child.isDir) {
        files.push({ relativePath: child.path, absolutePath: child.absolutePath });
      }
    }
    for (const child of node.children) {
      if (child.isDir) visit(child);
    }
  };

  visit(root);
  return files;
}
