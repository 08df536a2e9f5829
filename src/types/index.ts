export type OutputFormat = 'markdown' | 'plain';
export type PresetName = 'python' | 'node';
export type EntryKind = 'file' | 'directory' | 'other';

export type GitignoreSource =
  | { mode: 'auto' }
  | { mode: 'file'; path: string }
  | { mode: 'none' };

export interface DigestOptions {
  readonly rootDir: string;
  readonly format: OutputFormat;
  readonly gitignore: GitignoreSource;
  readonly preset?: PresetName | undefined;
  readonly extraIgnores: readonly string[];
  readonly includeHidden: boolean;
  readonly maxFileSize: number;
  readonly followSymlinks: boolean;
  readonly relativePaths: boolean;
  readonly encoding: string;
  readonly quiet: boolean;
}

export interface FsEntry {
  absolutePath: string;
  relativePath: string;
  kind: EntryKind;
  isSymlink: boolean;
  size: number;
  readable: boolean;
}

export interface TreeNode {
  name: string;
  path: string;
  absolutePath: string;
  isDir: boolean;
  isFile: boolean;
  children: TreeNode[];
}

export interface VisibleFile {
  relativePath: string;
  absolutePath: string;
}

export interface FilterResult {
  passes: boolean;
  reason: string;
}

export interface SkippedEntry {
  relativePath: string;
  reason: string;
}

export interface ScanResult {
  root: TreeNode;
  files: VisibleFile[];
  skipped: SkippedEntry[];
}

export interface FileContent extends VisibleFile {
  displayPath: string;
  language: string;
  content: string | null;
}

export interface Digest {
  rootDir: string;
  generatedAt: Date;
  treeLines: string[];
  files: FileContent[];
  skipped: SkippedEntry[];
}

export interface CLIOptions {
  root: string;
  output?: string | undefined;
  stdout: boolean;
  format: 'md' | 'txt';
  gitignore?: string | undefined;
  noGitignore: boolean;
  preset?: string | undefined;
  ignore: string[];
  includeHidden: boolean;
  maxFileSize: string;
  followSymlinks: boolean;
  absolutePaths: boolean;
  encoding: string;
  quiet: boolean;
  verbose: boolean;
}
