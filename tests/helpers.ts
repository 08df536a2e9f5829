import { execFileSync } from 'node:child_process';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import type { CLIOptions, DigestOptions } from '../src/types/index.js';
import { buildOptions, getDefaultOptions } from '../src/config/builder.js';

export type Fixture = Record<string, string | Uint8Array>;

export function makeTempDir(prefix = 'repo-digest-test-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** Writes `files` under `root`; a key ending in `/` creates an empty directory. */
export function writeFixture(root: string, files: Fixture): void {
  for (const [relPath, content] of Object.entries(files)) {
    const absPath = join(root, relPath);
    if (relPath.endsWith('/')) {
      mkdirSync(absPath, { recursive: true });
      continue;
    }
    mkdirSync(dirname(absPath), { recursive: true });
    writeFileSync(absPath, content);
  }
}

/** Creates a named pipe, an entry that is neither a regular file nor a directory. */
export function makeFifo(path: string): void {
  execFileSync('mkfifo', [path]);
}

export function makeOptions(root: string, overrides: Partial<CLIOptions> = {}): DigestOptions {
  return buildOptions({ ...getDefaultOptions(), root, ...overrides });
}
