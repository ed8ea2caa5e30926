/**
 * Graph Commands
 *
 * link, unlink and related.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { tierMarker } from '../../core/tiers.js';
import { DEFAULT_RELATION, KNOWN_RELATIONS } from '../../graph/KnowledgeGraph.js';
import { fail, openStore, withStoreOption, type StoreOptions } from '../shared.js';

interface LinkOptions extends StoreOptions {
  relation: string;
}

export const linkCommand = withStoreOption(
  new Command('link')
    .description('Link two leaves')
    .argument('<from>', 'Source leaf path')
    .argument('<to>', 'Target leaf path')
    .option('-r, --relation <relation>', `Relation (${KNOWN_RELATIONS.join(', ')}, or your own)`, DEFAULT_RELATION)
).action(async (from: string, to: string, options: LinkOptions) => {
  try {
    const kb = await openStore(options);
    const result = await kb.link(from, to, options.relation);
    await kb.close();

    const edge = `${result.from} -[${result.relation}]-> ${result.to}`;
    console.log(result.created ? chalk.green(`Linked ${edge}`) : chalk.dim(`Already linked: ${edge}`));
  } catch (error) {
    fail(null, 'Failed to link', error);
  }
});

export const unlinkCommand = withStoreOption(
  new Command('unlink')
    .description('Remove a link')
    .argument('<from>', 'Source leaf path')
    .argument('<to>', 'Target leaf path')
    .requiredOption('-r, --relation <relation>', 'Relation to remove')
).action(async (from: string, to: string, options: LinkOptions) => {
  try {
    const kb = await openStore(options);
    await kb.unlink(from, to, options.relation);
    await kb.close();
    console.log(chalk.green(`Unlinked ${from} -[${options.relation}]-> ${to}`));
  } catch (error) {
    fail(null, 'Failed to unlink', error);
  }
});

export const relatedCommand = withStoreOption(
  new Command('related')
    .description('Show leaves linked to or from a leaf')
    .argument('<path>', 'Leaf path')
).action(async (path: string, options: StoreOptions) => {
  try {
    const kb = await openStore(options);
    const related = await kb.related(path);
    await kb.close();

    if (related.length === 0) {
      console.log(chalk.dim('No links.'));
      return;
    }
    for (const entry of related) {
      const arrow = entry.direction === 'outgoing' ? '->' : '<-';
      console.log(`${chalk.yellow(entry.relation)} ${arrow} ${chalk.cyan(tierMarker(entry.tier))} ${entry.path}`);
      console.log(chalk.dim(`    ${entry.excerpt}`));
    }
  } catch (error) {
    fail(null, 'Failed to read links', error);
  }
});
