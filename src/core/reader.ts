import { readFileSync, statSync } from 'node:fs';
import { TextDecoder } from 'node:util';
import type { DigestOptions, FileContent, VisibleFile } from '../types/index.js';
import { getLanguage } from '../constants/languages.js';
import { isProbablyBinary } from './binary.js';

export function createDecoder(encoding: string): TextDecoder {
  return new TextDecoder(encoding, { fatal: false, ignoreBOM: true });
}

/**
 * Reads a file as text. Returns `null` for anything that should be replaced by
 * the placeholder: non-regular files, binary files and read failures. Byte
 * sequences invalid in the encoding decode to U+FFFD.
 */
export function readText(absPath: string, decoder: TextDecoder): string | null {
  try {
    if (!statSync(absPath).isFile()) {
      return null;
    }
  } catch {
    return null;
  }

  if (isProbablyBinary(absPath)) {
    return null;
  }

  try {
    return decoder.decode(readFileSync(absPath));
  } catch {
    return null;
  }
}

export function readFiles(files: VisibleFile[], options: DigestOptions): FileContent[] {
  const decoder = createDecoder(options.encoding);

  return files.map((file) => ({
    ...file,
    displayPath: options.relativePaths ? file.relativePath : file.absolutePath,
    language: getLanguage(file.relativePath),
    content: readText(file.absolutePath, decoder),
  }));
}
