#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { cleanCommand, configCommand } from './commands/index.js';
import { isPositiveInteger } from './core/index.js';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

function parseFlagName(value: string): string {
  if (!IDENTIFIER.test(value)) {
    throw new InvalidArgumentError('Flag names are identifiers: letters, digits and underscores.');
  }
  return value;
}

function parseConcurrency(value: string): number {
  const parsed = Number(value);
  if (!isPositiveInteger(parsed)) {
    throw new InvalidArgumentError('Expected a whole number greater than 0.');
  }
  return parsed;
}

const program = new Command();

program
  .name('flagsweep')
  .description(
    chalk.green('🧹 flagsweep') +
      ' - Feature Flag Removal Tool\n' +
      chalk.gray('Resolve a shipped flag out of #if blocks in Swift and Objective-C sources')
  )
  .version('1.0.0');

// =============================================================================
// COMMANDS
// =============================================================================

program
  .command('clean', { isDefault: true })
  .description('🧹 Remove a feature flag and its #if scaffolding')
  .requiredOption('-f, --flag <name>', 'Flag to remove', parseFlagName)
  .option('-p, --path <dir>', 'Directory to search (default: current directory)')
  .option('--dry-run', 'Preview what would change (no changes)')
  .option('-y, --yes', 'Skip confirmation prompt')
  .option('--json', 'Output as JSON (applying changes also needs --yes)')
  .option('-v, --verbose', 'List every processed file')
  .option('-c, --concurrency <n>', 'Files processed at the same time', parseConcurrency)
  .action(
    async (options: {
      flag: string;
      path?: string;
      dryRun?: boolean;
      yes?: boolean;
      json?: boolean;
      verbose?: boolean;
      concurrency?: number;
    }) => {
      await cleanCommand(options);
    }
  );

program
  .command('config')
  .description('⚙️  Set global defaults (concurrency, confirmation)')
  .action(async () => {
    await configCommand();
  });

// =============================================================================
// HELP TEXT
// =============================================================================

program.addHelpText(
  'after',
  `
${chalk.green.bold('Get Started:')}
  ${chalk.white('$')} flagsweep -f NEW_CHECKOUT --dry-run   ${chalk.gray('# 1. See what would change')}
  ${chalk.white('$')} flagsweep -f NEW_CHECKOUT             ${chalk.gray('# 2. Review and apply')}
  ${chalk.white('$')} flagsweep -f NEW_CHECKOUT -p ios -y   ${chalk.gray('# Apply under ./ios without asking')}

${chalk.cyan('Project Settings')} ${chalk.gray('(.flagsweeprc or "flagsweep" in package.json):')}
  ${chalk.gray('{ "ignore": ["Generated"], "extensions": [".swift"], "concurrency": 4 }')}
`
);

// Handle unknown commands
program.on('command:*', () => {
  console.error(chalk.red(`\nUnknown command: ${program.args.join(' ')}`));
  console.log(chalk.gray(`Run ${chalk.white('flagsweep --help')} for usage.\n`));
  process.exit(1);
});

await program.parseAsync();
