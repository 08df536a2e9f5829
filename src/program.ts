import { Command, Option } from 'commander';
import chalk from 'chalk';
import ora from 'ora';

import type { CLIOptions, SkippedEntry } from './types/index.js';
import { buildOptions, getDefaultOptions } from './config/builder.js';
import { assembleDigest, renderDigest } from './core/digest.js';
import { errorMessage } from './core/errors.js';
import { writeOutput } from './output/writer.js';
import { Defaults } from './constants/defaults.js';
import { getVersion } from './version.js';

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

export function toCliOptions(opts: Record<string, unknown>): CLIOptions {
  const defaults = getDefaultOptions();
  return {
    root: optionalString(opts.root) ?? defaults.root,
    output: optionalString(opts.output),
    stdout: Boolean(opts.stdout),
    format: opts.format === 'txt' ? 'txt' : 'md',
    gitignore: optionalString(opts.gitignore),
    noGitignore: opts.gitignore === false,
    preset: optionalString(opts.preset),
    ignore: stringList(opts.ignore),
    includeHidden: Boolean(opts.includeHidden),
    maxFileSize: optionalString(opts.maxFileSize) ?? defaults.maxFileSize,
    followSymlinks: Boolean(opts.followSymlinks),
    absolutePaths: Boolean(opts.absolutePaths),
    encoding: optionalString(opts.encoding) ?? defaults.encoding,
    quiet: Boolean(opts.quiet),
    verbose: Boolean(opts.verbose),
  };
}

function reportSkipped(skipped: readonly SkippedEntry[]): void {
  for (const entry of skipped) {
    console.error(chalk.dim(`  skipped ${entry.relativePath}: ${entry.reason}`));
  }
}

/**
 * Builds and writes the digest. Returns the process exit code: 0 on success,
 * 1 on any failure.
 */
export function run(options: CLIOptions): number {
  const spinner = ora({ text: 'Scanning files...', isSilent: options.quiet || options.stdout });

  try {
    const digestOptions = buildOptions(options);
    spinner.start();
    const digest = assembleDigest(digestOptions);
    spinner.succeed(`Found ${digest.files.length} files`);
    if (options.verbose && !options.quiet) {
      reportSkipped(digest.skipped);
    }

    writeOutput(renderDigest(digest, digestOptions.format), {
      stdout: options.stdout,
      outputFile: options.output,
      format: digestOptions.format,
      quiet: options.quiet,
    });
    return 0;
  } catch (error) {
    if (spinner.isSpinning) spinner.fail('Failed to build digest');
    if (!options.quiet) {
      console.error(chalk.red(`❌ Error: ${errorMessage(error)}`));
    }
    return 1;
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('repo-digest')
    .description('Stitch a folder tree and file contents into one Markdown/TXT context file')
    .version(getVersion(), '--version')

    // Input and output
    .option('--root <path>', 'Root directory to stitch', '.')
    .option('--output <path>', 'Output file path (default: auto-named)')
    .option('--stdout', 'Write to stdout instead of a file')
    .addOption(new Option('--format <format>', 'Output format').choices(['md', 'txt']).default(Defaults.FORMAT))

    // Filtering
    .option('--gitignore <path>', 'Path to a .gitignore to respect (default: <root>/.gitignore)')
    .option('--no-gitignore', 'Do not respect .gitignore even if present')
    .addOption(new Option('--preset <name>', 'Stack preset for ignores').choices(['python', 'node']))
    .option('--ignore <pattern>', 'Extra ignore pattern (repeatable)', collect, [])
    .option('--include-hidden', 'Include dotfiles and dot-directories')
    .option('--max-file-size <size>', 'Skip files larger than SIZE (e.g. 500k, 2m)', Defaults.MAX_FILE_SIZE)
    .option('--follow-symlinks', 'Follow symlinks')

    // Rendering
    .option('--absolute-paths', 'Use absolute paths in file sections')
    .option('--encoding <name>', 'Text encoding for file contents', Defaults.ENCODING)
    .option('--quiet', 'Suppress the success message and error output')
    .option('--verbose', 'List skipped entries and the rule that skipped each')

    .action((opts: Record<string, unknown>) => {
      process.exitCode = run(toCliOptions(opts));
    });

  return program;
}
