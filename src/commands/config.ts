import inquirer from 'inquirer';
import chalk from 'chalk';
import Conf from 'conf';
import { DEFAULT_CONCURRENCY, isPositiveInteger } from '../core/config.js';

interface GlobalConfig {
  concurrency?: number;
  assumeYes?: boolean;
}

const globalConf = new Conf<GlobalConfig>({
  projectName: 'flagsweep-global',
  configName: 'config',
});

export async function configCommand(): Promise<void> {
  console.log(chalk.green.bold('\n🧹 flagsweep - Global Configuration\n'));

  const concurrency = globalConf.get('concurrency') ?? DEFAULT_CONCURRENCY;
  const assumeYes = globalConf.get('assumeYes') ?? false;

  console.log(chalk.gray(`Concurrency: ${concurrency}`));
  console.log(chalk.gray(`Skip confirmation: ${assumeYes ? 'yes' : 'no'}\n`));

  const { action } = await inquirer.prompt<{ action: 'edit' | 'reset' | 'cancel' }>([
    {
      type: 'list',
      name: 'action',
      message: 'What would you like to do?',
      choices: [
        { name: 'Edit defaults', value: 'edit' },
        { name: 'Reset to defaults', value: 'reset' },
        { name: 'Cancel', value: 'cancel' },
      ],
    },
  ]);

  if (action === 'cancel') {
    return;
  }

  if (action === 'reset') {
    globalConf.clear();
    console.log(chalk.yellow('\nSettings reset to defaults.'));
    return;
  }

  const answers = await inquirer.prompt<{ concurrency: string; assumeYes: boolean }>([
    {
      type: 'input',
      name: 'concurrency',
      message: 'How many files should be processed at the same time?',
      default: String(concurrency),
      validate: validateConcurrency,
    },
    {
      type: 'confirm',
      name: 'assumeYes',
      message: 'Apply changes without asking for confirmation?',
      default: assumeYes,
    },
  ]);

  globalConf.set('concurrency', Number(answers.concurrency));
  globalConf.set('assumeYes', answers.assumeYes);

  console.log(chalk.green('\n✓ Settings saved successfully!'));
  console.log(chalk.gray('\nOptions passed to `flagsweep clean` still take precedence.\n'));
}

export function validateConcurrency(input: string): true | string {
  if (!isPositiveInteger(Number(input))) {
    return 'Please enter a whole number greater than 0';
  }
  return true;
}

export function getGlobalConcurrency(): number | undefined {
  // Check environment variable first (useful for CI/CD)
  const envValue = Number(process.env.FLAGSWEEP_CONCURRENCY);
  if (isPositiveInteger(envValue)) return envValue;

  const stored = globalConf.get('concurrency');
  return isPositiveInteger(stored) ? stored : undefined;
}

export function getGlobalAssumeYes(): boolean {
  return globalConf.get('assumeYes') === true;
}
