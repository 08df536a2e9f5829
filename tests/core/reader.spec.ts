import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { createDecoder, readFiles, readText } from '../../src/core/reader.js';
import { makeOptions, makeTempDir, removeDir, writeFixture } from '../helpers.js';

describe('readText', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => {
    removeDir(root);
  });

  it('reads text files whole', () => {
    writeFixture(root, { 'a.py': "print('hello')\n" });
    expect(readText(join(root, 'a.py'), createDecoder('utf-8'))).toBe("print('hello')\n");
  });

  it('replaces invalid byte sequences instead of failing', () => {
    writeFixture(root, { 'bad.txt': Uint8Array.from([0x61, 0xff, 0x62]) });
    expect(readText(join(root, 'bad.txt'), createDecoder('utf-8'))).toBe('a\uFFFDb');
  });

  it('decodes with the configured encoding', () => {
    writeFixture(root, { 'cafe.txt': Uint8Array.from([0x63, 0x61, 0x66, 0xe9]) });
    expect(readText(join(root, 'cafe.txt'), createDecoder('latin1'))).toBe('café');
  });

  it('keeps a byte order mark as content', () => {
    writeFixture(root, { 'bom.txt': Uint8Array.from([0xef, 0xbb, 0xbf, 0x61]) });
    expect(readText(join(root, 'bom.txt'), createDecoder('utf-8'))).toBe('\uFEFFa');
  });

  it('returns null for binary, missing and non-regular paths', () => {
    writeFixture(root, { 'x.bin': Uint8Array.from([0x00, 0x01, 0x02]), 'dir/': '' });
    const decoder = createDecoder('utf-8');
    expect(readText(join(root, 'x.bin'), decoder)).toBeNull();
    expect(readText(join(root, 'missing.txt'), decoder)).toBeNull();
    expect(readText(join(root, 'dir'), decoder)).toBeNull();
  });
});

describe('readFiles', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
    writeFixture(root, { 'src/main.ts': 'export {};\n', 'notes': 'n\n' });
  });

  afterEach(() => {
    removeDir(root);
  });

  const visible = () => [
    { relativePath: 'src/main.ts', absolutePath: join(root, 'src', 'main.ts') },
    { relativePath: 'notes', absolutePath: join(root, 'notes') },
  ];

  it('labels files with their relative path and language', () => {
    const files = readFiles(visible(), makeOptions(root));
    expect(files.map((f) => [f.displayPath, f.language, f.content])).toEqual([
      ['src/main.ts', 'typescript', 'export {};\n'],
      ['notes', '', 'n\n'],
    ]);
  });

  it('labels files with absolute paths when asked', () => {
    const files = readFiles(visible(), makeOptions(root, { absolutePaths: true }));
    expect(files.map((f) => f.displayPath)).toEqual([join(root, 'src', 'main.ts'), join(root, 'notes')]);
  });
});
