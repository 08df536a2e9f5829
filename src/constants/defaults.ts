import type { PresetName } from '../types/index.js';

export const Defaults = {
  MAX_FILE_SIZE: '1m',
  MAX_FILE_SIZE_BYTES: 1024 * 1024,
  FORMAT: 'md' as const,
  ENCODING: 'utf-8',
  BINARY_SAMPLE_BYTES: 2048,
  OUTPUT_PREFIX: 'repo-digest',
} as const;

export const TITLE = 'Repository Digest';
export const SKIPPED_PLACEHOLDER = '[Skipped: binary or unreadable]';

export const GlobalIgnores: readonly string[] = [
  // Version control
  '.git/', '.svn/', '.hg/',
  // OS droppings
  '.DS_Store', 'Thumbs.db',
  // IDE directories
  '.idea/', '.vscode/',
];

export const Presets: Readonly<Record<PresetName, readonly string[]>> = {
  python: [
    '__pycache__/',
    '*.py[cod]',
    '.mypy_cache/',
    '.pytest_cache/',
    '.tox/',
    '.venv/',
    'venv/',
    'env/',
    'build/',
    'dist/',
    '*.egg-info/',
  ],
  node: [
    'node_modules/',
    'dist/',
    'build/',
    '.next/',
    '.nuxt/',
    '.cache/',
    'coverage/',
    '*.log',
  ],
};

export function isPresetName(name: string): name is PresetName {
  return Object.prototype.hasOwnProperty.call(Presets, name);
}

export const GLYPH_CHILD = '├──';
export const GLYPH_LAST = '└──';
export const GLYPH_PIPE = '│   ';
export const GLYPH_SPACE = '    ';
