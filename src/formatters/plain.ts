import type { Digest } from '../types/index.js';
import { TITLE } from '../constants/defaults.js';
import { blockBody, formatTimestamp } from './common.js';

const HEAVY_RULE = '='.repeat(80);
const LIGHT_RULE = '-'.repeat(80);

export function formatPlain(digest: Digest): string {
  const lines: string[] = [
    `${TITLE} output`,
    `Root: ${digest.rootDir}`,
    `Generated: ${formatTimestamp(digest.generatedAt)}`,
    HEAVY_RULE,
    '',
    'FOLDER TREE',
    LIGHT_RULE,
    ...digest.treeLines,
    '',
    'FILES',
    LIGHT_RULE,
  ];

  for (const f of digest.files) {
    lines.push(`--- BEGIN FILE: ${f.displayPath} ---`);
    lines.push(blockBody(f.content));
    lines.push(`--- END FILE: ${f.displayPath} ---`);
    lines.push('');
  }

  lines.push('');
  return lines.join('\n');
}
