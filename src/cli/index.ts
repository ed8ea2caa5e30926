#!/usr/bin/env node
/**
 * Arbor CLI
 *
 * Command-line interface for the arbor knowledge base.
 */

import 'dotenv/config';
import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { treeCommand, branchCommand } from './commands/tree.js';
import { addCommand, getCommand, updateCommand, deleteCommand } from './commands/leaf.js';
import {
  searchCommand,
  tagsCommand,
  showCommand,
  primeCommand,
  contextCommand
} from './commands/search.js';
import { linkCommand, unlinkCommand, relatedCommand } from './commands/graph.js';
import { statsCommand, reindexCommand, checkCommand, pruneCommand } from './commands/maintenance.js';
import { modelCommand } from './commands/model.js';
import { serverCommand } from './commands/server.js';

const program = new Command();

program
  .name('arbor')
  .description('Arbor - persistent tree-structured knowledge base with semantic search')
  .version('0.1.0');

program.addCommand(initCommand);
program.addCommand(treeCommand);
program.addCommand(branchCommand);
program.addCommand(addCommand);
program.addCommand(getCommand);
program.addCommand(updateCommand);
program.addCommand(deleteCommand);
program.addCommand(searchCommand);
program.addCommand(tagsCommand);
program.addCommand(showCommand);
program.addCommand(primeCommand);
program.addCommand(contextCommand);
program.addCommand(linkCommand);
program.addCommand(unlinkCommand);
program.addCommand(relatedCommand);
program.addCommand(statsCommand);
program.addCommand(reindexCommand);
program.addCommand(checkCommand);
program.addCommand(pruneCommand);
program.addCommand(modelCommand);
program.addCommand(serverCommand);

await program.parseAsync();
