import { SKIPPED_PLACEHOLDER } from '../constants/defaults.js';

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local time as `YYYY-MM-DD HH:mm:ss`. */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

/**
 * The text placed between a file's opening and closing delimiters, without
 * its final newline; joining lines with `\n` puts exactly one back.
 */
export function blockBody(content: string | null): string {
  const text = content ?? SKIPPED_PLACEHOLDER;
  return text.endsWith('\n') ? text.slice(0, -1) : text;
}
