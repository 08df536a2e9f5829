import type { Digest } from '../types/index.js';
import { TITLE } from '../constants/defaults.js';
import { blockBody, formatTimestamp } from './common.js';

export function formatMarkdown(digest: Digest): string {
  const lines: string[] = [`# ${TITLE}`, ''];

  lines.push(`- **Root**: \`${digest.rootDir}\``);
  lines.push(`- **Generated**: ${formatTimestamp(digest.generatedAt)}`);
  lines.push(`- **Files included**: ${digest.files.length}`);
  lines.push('');
  lines.push('## Folder Tree');
  lines.push('');
  lines.push('```text');
  lines.push(...digest.treeLines);
  lines.push('```');
  lines.push('');
  lines.push('## Files');
  lines.push('');

  for (const f of digest.files) {
    lines.push(`### \`${f.displayPath}\``);
    lines.push('');
    lines.push(`\`\`\`${f.language}`);
    lines.push(blockBody(f.content));
    lines.push('```');
    lines.push('');
  }

  lines.push('');
  return lines.join('\n');
}
