import { Command } from 'commander';
import { runWizard, type WizardOptions } from './commands/wizard.js';
import { InquirerPromptProvider } from './prompts.js';
import { CancellationError, errorMessage } from '../utils/errors.js';
import { logger as log } from '../utils/logger.js';
import { getPackageVersion } from '../utils/package-root.js';

/** Create the CLI program. */
export function createCli(version: string = getPackageVersion()): Command {
  return new Command()
    .name('seedling')
    .description('Create a project interactively from a built-in template')
    .version(version)
    .option('-c, --config <path>', 'YAML config file (default: seedling.config.yaml if present)')
    .option('--skip-hooks', 'Do not run post-creation hook commands')
    .option('--verbose', 'Show debug output')
    .action(async (options: WizardOptions) => {
      try {
        await runWizard(options, {
          prompts: new InquirerPromptProvider(),
          cwd: process.cwd(),
          version,
        });
      } catch (error) {
        if (error instanceof CancellationError) {
          console.log();
          log.warn('User interrupted the operation');
        } else {
          log.error(`Program exception: ${errorMessage(error)}`);
        }
        process.exit(1);
      }
    });
}
