import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import chalk from 'chalk';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { createProgram, run, toCliOptions } from '../src/program.js';
import { getDefaultOptions } from '../src/config/builder.js';
import { makeTempDir, removeDir, writeFixture } from './helpers.js';

describe('toCliOptions', () => {
  it('reads commander values and falls back to defaults', () => {
    expect(
      toCliOptions({
        root: 'repo',
        gitignore: false,
        ignore: ['a', 'b'],
        format: 'txt',
        maxFileSize: '2m',
        stdout: true,
      }),
    ).toEqual({
      ...getDefaultOptions(),
      root: 'repo',
      output: undefined,
      gitignore: undefined,
      preset: undefined,
      noGitignore: true,
      ignore: ['a', 'b'],
      format: 'txt',
      maxFileSize: '2m',
      stdout: true,
    });
  });
});

describe('run', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
    writeFixture(root, { 'a.py': "print('hello')\n", 'binary.bin': Uint8Array.from([0, 1, 2]) });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    removeDir(root);
  });

  it('prints the document to stdout and returns 0', () => {
    const writeSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    const code = run({ ...getDefaultOptions(), root, stdout: true, noGitignore: true });

    expect(code).toBe(0);
    const written = String(writeSpy.mock.calls[0]?.[0]);
    expect(written).toContain('### `a.py`');
    expect(written).toContain('[Skipped: binary or unreadable]');
  });

  it('writes a plain-text file at the requested path', () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const output = join(root, 'out', 'digest.txt');

    const code = run({ ...getDefaultOptions(), root, output, format: 'txt', ignore: ['out/'] });

    expect(code).toBe(0);
    expect(readFileSync(output, 'utf-8')).toContain("--- BEGIN FILE: a.py ---\nprint('hello')\n--- END FILE: a.py ---\n");
  });

  it('reports the number of files found once the scan finishes', () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    const code = run({ ...getDefaultOptions(), root, output: join(root, 'digest.md') });

    expect(code).toBe(0);
    const written = stderrSpy.mock.calls.map((call) => String(call[0]));
    expect(written.some((line) => line.includes('Found 2 files'))).toBe(true);
  });

  it('lists skipped entries with their reasons when verbose', () => {
    writeFixture(root, { '.env': 'TOKEN=test-secret\n', 'debug.log': 'log\n' });
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const code = run({ ...getDefaultOptions(), root, stdout: true, ignore: ['*.log'], verbose: true });

    expect(code).toBe(0);
    expect(errorSpy).toHaveBeenCalledTimes(2);
    expect(errorSpy).toHaveBeenCalledWith(chalk.dim('  skipped .env: Hidden entry'));
    expect(errorSpy).toHaveBeenCalledWith(chalk.dim('  skipped debug.log: Matched ignore pattern'));
  });

  it('returns 1 and reports configuration errors', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const missing = join(root, 'missing');

    expect(run({ ...getDefaultOptions(), root: missing, stdout: true })).toBe(1);
    expect(String(errorSpy.mock.calls[0]?.[0])).toContain(`Error: Root does not exist or is not a directory: ${missing}`);
  });

  it('keeps quiet runs silent on failure', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    expect(run({ ...getDefaultOptions(), root, maxFileSize: 'huge', stdout: true, quiet: true })).toBe(1);
    expect(errorSpy).not.toHaveBeenCalled();
  });
});

describe('createProgram', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
    writeFixture(root, { 'keep.txt': 'keep\n', 'drop.log': 'drop\n', 'skip.tmp': 'skip\n' });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    removeDir(root);
  });

  it('parses repeatable ignores and sets a zero exit code', async () => {
    const writeSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    await createProgram().parseAsync(['--root', root, '--stdout', '--ignore', '*.log', '--ignore', '*.tmp'], { from: 'user' });

    expect(process.exitCode).toBe(0);
    const written = String(writeSpy.mock.calls[0]?.[0]);
    expect(written).toContain('### `keep.txt`');
    expect(written).not.toContain('drop.log');
    expect(written).not.toContain('skip.tmp');
  });

  it('sets exit code 1 when the run fails', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await createProgram().parseAsync(['--root', join(root, 'nope'), '--stdout'], { from: 'user' });

    expect(process.exitCode).toBe(1);
  });
});
