/**
 * Leaf Commands
 *
 * add, get, update and delete for single leaves.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { tierMarker } from '../../core/tiers.js';
import type { Leaf, UpdateLeafInput } from '../../core/types.js';
import { parseLeafPath } from '../../storage/LeafDocument.js';
import { fail, openStore, parseNumber, splitList, withStoreOption, type StoreOptions } from '../shared.js';

interface AddOptions extends StoreOptions {
  tree?: string;
  name?: string;
  tier: string;
  confidence: string;
  tags?: string;
  output: string;
}

interface UpdateOptions extends StoreOptions {
  tier?: string;
  confidence?: string;
  tags?: string;
}

interface OutputOptions extends StoreOptions {
  output: string;
}

function printLeaf(leaf: Leaf): void {
  console.log(chalk.cyan(`${tierMarker(leaf.tier)} ${leaf.path}`));
  console.log(chalk.dim('Title:'), leaf.title);
  console.log(chalk.dim('Tier:'), leaf.tier, chalk.dim('Confidence:'), leaf.confidence.toFixed(2));
  console.log(chalk.dim('Tags:'), leaf.tags.join(', ') || '(none)');
  console.log(chalk.dim('Updated:'), leaf.updatedAt);
  for (const link of leaf.links) {
    console.log(chalk.dim('Link:'), `${link.relation} -> ${link.to}`);
  }
  console.log();
  console.log(leaf.content);
}

export const addCommand = withStoreOption(
  new Command('add')
    .description('Add a leaf to a branch (use <tree>/<branch> to create it on the fly)')
    .argument('<location>', 'Branch, or tree/branch')
    .argument('<content>', 'Leaf content')
    .option('-t, --tree <tree>', 'Tree that owns the branch')
    .option('-n, --name <name>', 'Leaf name (default: derived from the content)')
    .option('--tier <tier>', 'Tier (leaves, branches, trunk, roots)', 'leaves')
    .option('-c, --confidence <number>', 'Confidence (0-1)', '0.5')
    .option('--tags <tags>', 'Comma-separated tags')
    .option('-o, --output <format>', 'Output format (json, text)', 'text')
).action(async (location: string, content: string, options: AddOptions) => {
  const spinner = ora('Adding leaf...').start();

  try {
    const kb = await openStore(options);
    const leaf = await kb.addLeaf({
      branch: location,
      tree: options.tree,
      content,
      name: options.name,
      tier: options.tier,
      confidence: parseNumber(options.confidence),
      tags: splitList(options.tags)
    });
    const pending = kb.index.pendingPaths(kb.storeSettings.model).includes(leaf.path);
    await kb.close();

    spinner.succeed(`Added ${leaf.path}`);
    if (pending) {
      console.error(chalk.yellow('Embedding pending: run `arbor reindex` once the embedding server is back.'));
    }
    if (options.output === 'json') {
      console.log(JSON.stringify(leaf, null, 2));
    } else {
      console.log(leaf.path);
    }
  } catch (error) {
    fail(spinner, 'Failed to add leaf', error);
  }
});

export const getCommand = withStoreOption(
  new Command('get')
    .description('Show a leaf')
    .argument('<path>', 'Leaf path (tree/branch/name[.md])')
    .option('-o, --output <format>', 'Output format (json, text)', 'text')
).action(async (path: string, options: OutputOptions) => {
  try {
    const kb = await openStore(options);
    const leaf = await kb.getLeaf(path);
    await kb.close();

    if (options.output === 'json') {
      console.log(JSON.stringify(leaf, null, 2));
    } else {
      printLeaf(leaf);
    }
  } catch (error) {
    fail(null, 'Failed to read leaf', error);
  }
});

export const updateCommand = withStoreOption(
  new Command('update')
    .description('Change the tier, confidence or tags of a leaf')
    .argument('<path>', 'Leaf path')
    .option('--tier <tier>', 'New tier')
    .option('-c, --confidence <number>', 'New confidence (0-1)')
    .option('--tags <tags>', 'Replace tags (comma-separated)')
).action(async (path: string, options: UpdateOptions) => {
  try {
    const changes: UpdateLeafInput = {};
    if (options.tier !== undefined) changes.tier = options.tier;
    if (options.confidence !== undefined) changes.confidence = parseNumber(options.confidence);
    if (options.tags !== undefined) changes.tags = splitList(options.tags);

    const kb = await openStore(options);
    const leaf = await kb.updateLeaf(path, changes);
    await kb.close();

    console.log(chalk.green(`Updated ${leaf.path}`), chalk.dim(`(${leaf.tier}, ${leaf.confidence.toFixed(2)})`));
  } catch (error) {
    fail(null, 'Failed to update leaf', error);
  }
});

export const deleteCommand = withStoreOption(
  new Command('delete')
    .description('Delete a leaf and every link touching it')
    .argument('<path>', 'Leaf path')
    .option('-f, --force', 'Delete even when other leaves link to it', false)
).action(async (path: string, options: StoreOptions & { force: boolean }) => {
  try {
    const kb = await openStore(options);
    const incoming = kb.index.incomingLinks(parseLeafPath(path).path);

    if (incoming.length > 0 && !options.force) {
      await kb.close();
      console.error(chalk.yellow(`${incoming.length} leaves link here:`));
      for (const link of incoming) {
        console.error(`  ${link.from} (${link.relation})`);
      }
      console.error('Use --force to delete anyway; those links are removed.');
      process.exit(1);
    }

    await kb.deleteLeaf(path);
    await kb.close();
    console.log(chalk.green(`Deleted ${path}`));
  } catch (error) {
    fail(null, 'Failed to delete leaf', error);
  }
});
