/**
 * clean command - Remove a feature flag from Swift and Objective-C sources
 *
 * Usage:
 *   flagsweep clean -f NEW_ONBOARDING              # Preview, confirm, apply
 *   flagsweep clean -f NEW_ONBOARDING --dry-run    # Show what would change
 *   flagsweep clean -f NEW_ONBOARDING -p ./App -y  # No prompt
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import chalk from 'chalk';
import ora from 'ora';
import inquirer from 'inquirer';
import { findFlaggedFiles, resolveProjectConfig, type SearchResult } from '../core/index.js';
import { defaultRegistry, generateDiffPreview, sweep } from '../refactor/index.js';
import type { CleanCommandOptions, FileReport, SweepResult } from '../refactor/types.js';
import { getGlobalAssumeYes, getGlobalConcurrency } from './config.js';

/** Groups with more files than this are cut down to MAX_LISTED entries */
const MAX_GROUP_SIZE = 15;
const MAX_LISTED = 10;
const MAX_DIFF_PREVIEWS = 5;

export async function cleanCommand(options: CleanCommandOptions): Promise<void> {
  const startTime = Date.now();
  const rootDir = path.resolve(options.path ?? process.cwd());

  if (!isDirectory(rootDir)) {
    console.error(chalk.red(`\nError: Path does not exist or is not a directory: ${rootDir}\n`));
    process.exit(1);
  }

  const settings = resolveProjectConfig(rootDir, defaultRegistry.getSupportedExtensions(), getGlobalConcurrency());
  const concurrency = options.concurrency ?? settings.concurrency;
  const flag = options.flag;

  const spinner = ora(`Searching for "${flag}" in ${rootDir}...`).start();

  let search: SearchResult;
  let planned: SweepResult;
  try {
    search = await findFlaggedFiles({
      rootDir,
      flag,
      extensions: settings.extensions,
      ignore: settings.ignore,
      concurrency,
    });
    spinner.succeed(
      `Found ${search.matchingFiles.length} matching source files out of ${search.sourceFiles.length} total`
    );

    // First pass: dry run to show what would change
    planned = await sweep({ flag, files: search.matchingFiles, dryRun: true, concurrency });
  } catch (error) {
    spinner.fail('Search failed');
    console.error(chalk.red(`\nError: ${error}\n`));
    process.exit(1);
  }

  const hasChanges = planned.written.length > 0 || planned.deleted.length > 0;

  if (!hasChanges || options.dryRun) {
    if (options.json) {
      console.log(JSON.stringify(toJsonReport(planned, { flag, rootDir, search, dryRun: true, startTime }), null, 2));
    } else if (hasChanges) {
      printPreview(planned, flag, rootDir);
      console.log(chalk.gray('\n  Dry run - no changes made.'));
      console.log(chalk.gray('  Run without --dry-run to apply changes.\n'));
    } else {
      console.log(chalk.green(`\n  No blocks depending only on ${flag} were found.\n`));
      printReview(planned, rootDir, options.verbose);
    }

    if (planned.failed.length > 0) {
      process.exit(1);
    }
    return;
  }

  if (!options.json) {
    printPreview(planned, flag, rootDir);
  }

  // Ask for confirmation unless --yes flag or the global default says otherwise
  if (!options.yes && !getGlobalAssumeYes()) {
    // The prompt would land in the middle of the report
    if (options.json) {
      console.error(chalk.red('\nError: --json needs --yes to apply changes (or use --dry-run)\n'));
      process.exit(1);
    }

    const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
      {
        type: 'confirm',
        name: 'confirm',
        message: chalk.yellow(
          `Modify ${planned.written.length} file(s) and delete ${planned.deleted.length} file(s)?`
        ),
        default: false,
      },
    ]);

    if (!confirm) {
      console.log(chalk.gray('\n  Clean cancelled.\n'));
      return;
    }
  }

  // Apply changes
  spinner.start(`Removing ${flag}...`);

  let result: SweepResult;
  try {
    result = await sweep({ flag, files: search.matchingFiles, dryRun: false, concurrency });
  } catch (error) {
    spinner.fail('Clean failed');
    console.error(chalk.red(`\nError: ${error}\n`));
    process.exit(1);
  }

  if (result.failed.length === 0) {
    spinner.succeed('Clean complete');
  } else {
    spinner.fail(`Clean finished with ${result.failed.length} failure(s)`);
  }

  if (options.json) {
    console.log(JSON.stringify(toJsonReport(result, { flag, rootDir, search, dryRun: false, startTime }), null, 2));
  } else {
    printSummary(result, rootDir, startTime, options.verbose);
  }

  if (result.failed.length > 0) {
    process.exit(1);
  }
}

function isDirectory(dir: string): boolean {
  try {
    return fs.statSync(dir).isDirectory();
  } catch {
    return false;
  }
}

// ============================================================================
// Reporting
// ============================================================================

interface ReportContext {
  flag: string;
  rootDir: string;
  search: SearchResult;
  dryRun: boolean;
  startTime: number;
}

export function toJsonReport(result: SweepResult, context: ReportContext) {
  const relative = (filePath: string) => path.relative(context.rootDir, filePath);

  return {
    flag: context.flag,
    rootDir: context.rootDir,
    dryRun: context.dryRun,
    sourceFiles: context.search.sourceFiles.length,
    matchingFiles: context.search.matchingFiles.length,
    written: result.written.map(relative),
    deleted: result.deleted.map(relative),
    unchanged: result.unchanged.map(relative),
    failed: result.failed.map((report) => ({
      file: relative(report.filePath),
      kind: report.error?.kind,
      message: report.error?.message,
      line: report.error?.line,
    })),
    skipped: result.reports.flatMap((report) =>
      report.skipped.map((block) => ({ file: relative(report.filePath), line: block.line, reason: block.reason }))
    ),
    elapsedSeconds: Number(((Date.now() - context.startTime) / 1000).toFixed(2)),
  };
}

/**
 * Group files by extension, sorted by extension and then by path
 */
export function groupByExtension(files: string[]): Array<[string, string[]]> {
  const groups = new Map<string, string[]>();
  for (const file of files) {
    const ext = path.extname(file) || 'Unknown';
    const existing = groups.get(ext) || [];
    existing.push(file);
    groups.set(ext, existing);
  }

  return Array.from(groups.entries())
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([ext, group]): [string, string[]] => [ext, [...group].sort()]);
}

/**
 * Print a preview of what will change
 */
function printPreview(result: SweepResult, flag: string, rootDir: string): void {
  const relative = (filePath: string) => path.relative(rootDir, filePath);

  console.log(chalk.cyan(`\n  Removing ${flag}\n`));

  if (result.deleted.length > 0) {
    console.log(chalk.red(`  Files left empty, to delete (${result.deleted.length}):\n`));
    for (const file of result.deleted) {
      console.log(`    ${chalk.red('-')} ${relative(file)}`);
    }
    console.log('');
  }

  const modified = result.reports.filter((report) => report.status === 'written');
  if (modified.length > 0) {
    console.log(chalk.yellow(`  Files to modify (${modified.length}):\n`));
    for (const report of modified) {
      console.log(`    ${chalk.yellow('~')} ${relative(report.filePath)}`);
    }
    console.log('');
  }

  // Show file diffs
  if (modified.length > 0 && modified.length <= MAX_DIFF_PREVIEWS) {
    console.log(chalk.cyan('  Preview of changes:\n'));
    console.log(chalk.gray('─'.repeat(50)));

    for (const report of modified) {
      const diff = generateDiffPreview({
        filePath: relative(report.filePath),
        originalContent: report.originalText ?? '',
        newContent: report.newText ?? '',
      });
      for (const line of diff.split('\n')) {
        if (line.startsWith('-') && !line.startsWith('---')) {
          console.log(chalk.red(`  ${line}`));
        } else if (line.startsWith('+') && !line.startsWith('+++')) {
          console.log(chalk.green(`  ${line}`));
        } else {
          console.log(chalk.gray(`  ${line}`));
        }
      }
      console.log('');
    }
  } else if (modified.length > MAX_DIFF_PREVIEWS) {
    console.log(chalk.gray(`  (${modified.length} files will be modified - too many to preview)\n`));
  }

  printWarnings(result, rootDir);

  // Summary line
  console.log(chalk.gray('─'.repeat(50)));
  console.log(
    `  Total: ${chalk.yellow(result.written.length)} to modify, ${chalk.red(result.deleted.length)} to delete`
  );
  console.log('');
}

function printWarnings(result: SweepResult, rootDir: string): void {
  const relative = (filePath: string) => path.relative(rootDir, filePath);
  const withSkipped = result.reports.filter((report) => report.skipped.length > 0);

  if (withSkipped.length > 0) {
    console.log(chalk.yellow('  Blocks left for manual review:\n'));
    for (const report of withSkipped) {
      for (const block of report.skipped) {
        console.log(`    ${chalk.yellow('!')} ${relative(report.filePath)}:${block.line} ${chalk.gray(block.reason)}`);
      }
    }
    console.log('');
  }

  if (result.failed.length > 0) {
    console.log(chalk.red(`  Failed (${result.failed.length}):\n`));
    for (const report of result.failed) {
      console.log(`    ${chalk.red('✗')} ${relative(report.filePath)} ${chalk.gray(describeFailure(report))}`);
    }
    console.log('');
  }
}

function describeFailure(report: FileReport): string {
  if (!report.error) return 'unknown error';
  const where = report.error.line !== undefined ? ` (line ${report.error.line})` : '';
  return `${report.error.kind} error: ${report.error.message}${where}`;
}

/**
 * Files that matched the search but came out unchanged, plus warnings
 */
function printReview(result: SweepResult, rootDir: string, verbose?: boolean): void {
  const relative = (filePath: string) => path.relative(rootDir, filePath);

  if (verbose) {
    for (const report of result.reports) {
      console.log(chalk.gray(`    ${report.status.padEnd(9)} ${relative(report.filePath)}`));
    }
    console.log('');
  }

  printWarnings(result, rootDir);

  if (result.unchanged.length === 0) return;

  console.log(chalk.yellow.bold(`  ⚠️ The following ${result.unchanged.length} files were matched but had no changes:`));
  console.log(chalk.yellow('  These files may need manual review as they might contain the flag in a different format:'));

  for (const [ext, files] of groupByExtension(result.unchanged)) {
    console.log(chalk.bold.underline(`\n  ${ext} files (${files.length}):`));
    const listed = files.length > MAX_GROUP_SIZE ? files.slice(0, MAX_LISTED) : files;
    for (const file of listed) {
      console.log(chalk.yellow(`    - ${relative(file)}`));
    }
    if (listed.length < files.length) {
      console.log(chalk.gray(`    ... and ${files.length - listed.length} more`));
    }
  }
  console.log('');
}

/**
 * Print summary after the clean is complete
 */
function printSummary(result: SweepResult, rootDir: string, startTime: number, verbose?: boolean): void {
  const processed = result.written.length + result.deleted.length;
  const elapsed = ((Date.now() - startTime) / 1000).toFixed(2);

  console.log(chalk.green('\n  Clean Summary\n'));
  console.log(`    ${chalk.green('Processed')} ${processed} out of ${result.reports.length} file(s)`);

  if (result.written.length > 0) {
    console.log(`    ${chalk.green('Modified')} ${result.written.length} file(s)`);
  }

  if (result.deleted.length > 0) {
    console.log(`    ${chalk.green('Deleted')} ${result.deleted.length} empty file(s)`);
    for (const file of result.deleted) {
      console.log(chalk.gray(`      - ${path.relative(rootDir, file)}`));
    }
  }

  console.log(chalk.gray(`    Total processing time: ${elapsed} seconds`));
  console.log('');

  printReview(result, rootDir, verbose);
}
