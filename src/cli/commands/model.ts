/**
 * Model Command
 *
 * Show or switch the embedding model a store uses.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { MODEL_REGISTRY } from '../../server/models.js';
import { fail, openStore, withStoreOption, type StoreOptions } from '../shared.js';

export const modelCommand = withStoreOption(
  new Command('model')
    .description('Show or set the embedding model of a store')
    .argument('[alias]', `Model alias (${MODEL_REGISTRY.map(spec => spec.alias).join(', ')})`)
).action(async (alias: string | undefined, options: StoreOptions) => {
  try {
    const kb = await openStore(options);

    if (!alias) {
      const settings = kb.storeSettings;
      await kb.close();
      console.log(`${chalk.cyan(settings.model)} via ${settings.provider} (${settings.dimensions} dimensions)`);
      return;
    }

    const change = await kb.setModel(alias);
    await kb.close();

    console.log(chalk.green(`Store now uses ${change.settings.model} (${change.settings.dimensions} dimensions)`));
    if (change.reindexRequired) {
      console.log(chalk.yellow("Existing embeddings were built with another model. Run 'arbor reindex'."));
    }
  } catch (error) {
    fail(null, 'Failed to set model', error);
  }
});
