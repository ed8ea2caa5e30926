/**
 * Tree and Branch Commands
 *
 * Without a name these list; with a name they create.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { fail, openStore, withStoreOption, type StoreOptions } from '../shared.js';

interface StructureOptions extends StoreOptions {
  description?: string;
}

export const treeCommand = withStoreOption(
  new Command('tree')
    .description('Create a tree, or list trees when no name is given')
    .argument('[name]', 'Tree name')
    .option('-d, --description <text>', 'Description', '')
).action(async (name: string | undefined, options: StructureOptions) => {
  try {
    const kb = await openStore(options);

    if (name === undefined) {
      const trees = kb.listTrees();
      if (trees.length === 0) {
        console.log(chalk.dim('No trees yet. Create one with: arbor tree <name>'));
      }
      for (const tree of trees) {
        const branches = kb.listBranches(tree.name).length;
        const description = tree.description ? chalk.dim(` - ${tree.description}`) : '';
        console.log(`${chalk.white(tree.name)}/ ${chalk.dim(`(${branches} branches)`)}${description}`);
      }
    } else {
      const tree = await kb.createTree(name, options.description ?? '');
      console.log(chalk.green(`Created tree ${tree.name}`));
    }

    await kb.close();
  } catch (error) {
    fail(null, 'Tree command failed', error);
  }
});

export const branchCommand = withStoreOption(
  new Command('branch')
    .description('Create a branch in a tree, or list its branches when no name is given')
    .argument('<tree>', 'Tree name')
    .argument('[name]', 'Branch name')
    .option('-d, --description <text>', 'Description', '')
).action(async (tree: string, name: string | undefined, options: StructureOptions) => {
  try {
    const kb = await openStore(options);

    if (name === undefined) {
      for (const branch of kb.listBranches(tree)) {
        const leaves = kb.listLeaves(tree, branch.name).length;
        const description = branch.description ? chalk.dim(` - ${branch.description}`) : '';
        console.log(`${chalk.white(`${tree}/${branch.name}`)} ${chalk.dim(`(${leaves} leaves)`)}${description}`);
      }
    } else {
      const branch = await kb.createBranch(tree, name, options.description ?? '', { createTree: true });
      console.log(chalk.green(`Created branch ${branch.tree}/${branch.name}`));
    }

    await kb.close();
  } catch (error) {
    fail(null, 'Branch command failed', error);
  }
});
