/**
 * Init Command
 *
 * Create a knowledge store and record which embedding model it uses.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { fail, openStore, withStoreOption, type StoreOptions } from '../shared.js';

interface InitOptions extends StoreOptions {
  model?: string;
}

export const initCommand = withStoreOption(
  new Command('init')
    .description('Initialize a knowledge store')
    .option('-m, --model <alias>', 'Embedding model alias (lite, minilm, nomic, ...)')
).action(async (options: InitOptions) => {
  const spinner = ora('Initializing store...').start();

  try {
    const kb = await openStore(options);
    const result = await kb.init({ model: options.model });
    await kb.close();

    spinner.succeed(chalk.green(result.created ? 'Store initialized' : 'Store already initialized'));
    console.log();
    console.log(chalk.dim('Store:'), result.storePath);
    console.log(chalk.dim('Provider:'), result.settings.provider);
    console.log(chalk.dim('Model:'), `${result.settings.model} (${result.settings.dimensions} dimensions)`);
    console.log();
    console.log(chalk.cyan('Next steps:'));
    console.log('  arbor tree <name>');
    console.log('  arbor add <tree>/<branch> "Your first insight"');
  } catch (error) {
    fail(spinner, 'Initialization failed', error);
  }
});
