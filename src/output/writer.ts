import { writeFileSync, mkdirSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import chalk from 'chalk';
import type { OutputFormat } from '../types/index.js';
import { Defaults } from '../constants/defaults.js';

export interface OutputTarget {
  stdout: boolean;
  outputFile?: string | undefined;
  format: OutputFormat;
  quiet: boolean;
}

export function defaultOutputPath(format: OutputFormat, cwd: string = process.cwd(), now: Date = new Date()): string {
  const suffix = format === 'plain' ? '.txt' : '.md';
  return join(cwd, `${Defaults.OUTPUT_PREFIX}-${Math.floor(now.getTime() / 1000)}${suffix}`);
}

/**
 * Writes the document to stdout or to a file. `--stdout` wins over
 * `--output`. Returns the path written, or `null` for stdout.
 */
export function writeOutput(content: string, target: OutputTarget): string | null {
  if (target.stdout) {
    process.stdout.write(content);
    return null;
  }

  const outputFile = resolve(target.outputFile ?? defaultOutputPath(target.format));
  mkdirSync(dirname(outputFile), { recursive: true });
  writeFileSync(outputFile, content, 'utf-8');

  if (!target.quiet) {
    console.error(chalk.green(`✅ Written to ${outputFile}`));
  }
  return outputFile;
}
