import { statSync } from 'node:fs';
import { resolve } from 'node:path';
import type { CLIOptions, DigestOptions, GitignoreSource, OutputFormat, PresetName } from '../types/index.js';
import { Defaults, isPresetName } from '../constants/defaults.js';
import { ConfigurationError } from '../core/errors.js';
import { parseSize } from './size.js';

export { parseSize } from './size.js';

function resolveRoot(root: string): string {
  const rootDir = resolve(root);
  let isDirectory = false;
  try {
    isDirectory = statSync(rootDir).isDirectory();
  } catch {
    isDirectory = false;
  }
  if (!isDirectory) {
    throw new ConfigurationError(`Root does not exist or is not a directory: ${rootDir}`);
  }
  return rootDir;
}

function resolvePreset(preset: string | undefined): PresetName | undefined {
  if (!preset) return undefined;
  const normalized = preset.toLowerCase();
  if (!isPresetName(normalized)) {
    throw new ConfigurationError(`Unknown preset: ${preset}`);
  }
  return normalized;
}

function resolveEncoding(encoding: string): string {
  try {
    return new TextDecoder(encoding).encoding;
  } catch {
    throw new ConfigurationError(`Unsupported encoding: ${encoding}`);
  }
}

function resolveGitignore(options: CLIOptions): GitignoreSource {
  if (options.noGitignore) return { mode: 'none' };
  if (options.gitignore) return { mode: 'file', path: resolve(options.gitignore) };
  return { mode: 'auto' };
}

export function toOutputFormat(format: CLIOptions['format']): OutputFormat {
  return format === 'txt' ? 'plain' : 'markdown';
}

/**
 * Validates CLI options and freezes them into the engine's configuration.
 * Throws `ConfigurationError` before anything is read or written.
 */
export function buildOptions(options: CLIOptions): DigestOptions {
  return Object.freeze({
    rootDir: resolveRoot(options.root),
    format: toOutputFormat(options.format),
    gitignore: resolveGitignore(options),
    preset: resolvePreset(options.preset),
    extraIgnores: Object.freeze([...options.ignore]),
    includeHidden: options.includeHidden,
    maxFileSize: parseSize(options.maxFileSize, Defaults.MAX_FILE_SIZE_BYTES),
    followSymlinks: options.followSymlinks,
    relativePaths: !options.absolutePaths,
    encoding: resolveEncoding(options.encoding),
    quiet: options.quiet,
  });
}

export function getDefaultOptions(): CLIOptions {
  return {
    root: '.',
    stdout: false,
    format: Defaults.FORMAT,
    noGitignore: false,
    ignore: [],
    includeHidden: false,
    maxFileSize: Defaults.MAX_FILE_SIZE,
    followSymlinks: false,
    absolutePaths: false,
    encoding: Defaults.ENCODING,
    quiet: false,
    verbose: false,
  };
}
