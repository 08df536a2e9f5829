import { InvalidSizeError } from '../core/errors.js';

const SIZE_PATTERN = /^(\d+(?:\.\d+)?)([kmg])$/;
const BYTES_PATTERN = /^\d+$/;

const multipliers: Record<string, number> = {
  k: 1024,
  m: 1024 ** 2,
  g: 1024 ** 3,
};

/**
 * Parses sizes such as `500k`, `1.5m` or `2048` into a byte count.
 * Units are binary multiples; an empty string yields `defaultBytes`.
 */
export function parseSize(sizeStr: string | undefined, defaultBytes: number): number {
  if (!sizeStr) return defaultBytes;

  const normalized = sizeStr.trim().toLowerCase();
  if (!normalized) return defaultBytes;

  if (BYTES_PATTERN.test(normalized)) {
    return parseInt(normalized, 10);
  }

  const match = SIZE_PATTERN.exec(normalized);
  const amount = match?.[1];
  const unit = match?.[2];
  if (amount === undefined || unit === undefined) {
    throw new InvalidSizeError(sizeStr);
  }

  return Math.floor(parseFloat(amount) * (multipliers[unit] ?? 1));
}
