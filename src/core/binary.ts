import { closeSync, openSync, readSync } from 'node:fs';
import { Defaults } from '../constants/defaults.js';

const NON_TEXT_THRESHOLD = 0.3;

function isTextByte(byte: number): boolean {
  if (byte >= 0x20) return true;
  return byte === 0x07 || byte === 0x08 || byte === 0x09 || byte === 0x0a || byte === 0x0c || byte === 0x0d || byte === 0x1b;
}

export function isBinaryBuffer(sample: Uint8Array): boolean {
  let nonText = 0;
  for (const byte of sample) {
    if (byte === 0) return true;
    if (!isTextByte(byte)) nonText++;
  }
  return nonText / Math.max(1, sample.length) > NON_TEXT_THRESHOLD;
}

/**
 * Classifies a file by its leading bytes. Files that cannot be opened or
 * read count as binary so their bytes never reach the document.
 */
export function isProbablyBinary(absPath: string, sampleBytes: number = Defaults.BINARY_SAMPLE_BYTES): boolean {
  let fd: number | undefined;
  try {
    fd = openSync(absPath, 'r');
    const buffer = Buffer.alloc(sampleBytes);
    const bytesRead = readSync(fd, buffer, 0, sampleBytes, 0);
    return isBinaryBuffer(buffer.subarray(0, bytesRead));
  } catch {
    return true;
  } finally {
    if (fd !== undefined) closeSync(fd);
  }
}
