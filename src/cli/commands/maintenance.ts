/**
 * Maintenance Commands
 *
 * stats, reindex, check and prune.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { describeReason } from '../../analysis/PruneAnalyzer.js';
import { TIERS } from '../../core/tiers.js';
import { fail, openStore, parseNumber, withStoreOption, type StoreOptions } from '../shared.js';

interface PruneCommandOptions extends StoreOptions {
  tree?: string;
  branch?: string;
  staleDays: string;
  minConfidence: string;
  detectConflicts: boolean;
}

export const statsCommand = withStoreOption(
  new Command('stats')
    .description('Display knowledge base statistics')
    .option('-o, --output <format>', 'Output format (json, text)', 'text')
).action(async (options: StoreOptions & { output: string }) => {
  try {
    const kb = await openStore(options);
    const stats = kb.stats();
    await kb.close();

    if (options.output === 'json') {
      console.log(JSON.stringify(stats, null, 2));
      return;
    }

    console.log(chalk.cyan('Knowledge Base Statistics'));
    console.log(chalk.dim('─'.repeat(40)));
    console.log(chalk.dim('Store:'), stats.storePath);
    console.log(chalk.dim('Trees:'), chalk.white(stats.trees.toString()));
    console.log(chalk.dim('Branches:'), chalk.white(stats.branches.toString()));
    console.log(chalk.dim('Leaves:'), chalk.white(stats.leaves.toString()));
    for (const tier of [...TIERS].reverse()) {
      console.log(chalk.dim(`  ${tier}:`), chalk.white(stats.byTier[tier].toString()));
    }
    console.log(chalk.dim('Links:'), chalk.white(stats.links.toString()));
    console.log(chalk.dim('Tags:'), chalk.white(stats.tags.toString()));
    console.log();
    console.log(chalk.dim('Provider:'), `${stats.provider} (${stats.model}, ${stats.dimensions} dimensions)`);
    console.log(chalk.dim('Index built with:'), stats.indexModel ?? '(nothing embedded yet)');
    if (stats.pendingEmbeddings > 0) {
      console.log(chalk.yellow(`Pending embeddings: ${stats.pendingEmbeddings} (run 'arbor reindex')`));
    }
  } catch (error) {
    fail(null, 'Failed to gather statistics', error);
  }
});

export const reindexCommand = withStoreOption(
  new Command('reindex').description('Rebuild the index from the leaf files')
).action(async (options: StoreOptions) => {
  const spinner = ora('Rebuilding index...').start();

  try {
    const kb = await openStore(options);
    const result = await kb.reindex();
    await kb.close();

    spinner.succeed(
      `Indexed ${result.leaves} leaves, ${result.branches} branches, ${result.trees} trees, ` +
      `${result.links} links in ${result.durationMs}ms`
    );
    if (result.pending > 0) {
      console.error(chalk.yellow(`${result.pending} leaves have no embedding (embedding server unavailable?)`));
    }
    for (const path of result.skipped) {
      console.error(chalk.yellow(`Skipped unreadable leaf: ${path}`));
    }
  } catch (error) {
    fail(spinner, 'Reindex failed', error);
  }
});

export const checkCommand = withStoreOption(
  new Command('check')
    .description('Compare the index with the leaf files')
    .option('--repair', 'Fix differences row by row', false)
).action(async (options: StoreOptions & { repair: boolean }) => {
  try {
    const kb = await openStore(options);
    const report = kb.check();

    const sections: Array<[string, string[]]> = [
      ['Not indexed', report.missing],
      ['Index rows without a file', report.orphaned],
      ['Out of date', report.stale],
      ['Unreadable', report.invalid],
      ['Pending embeddings', report.pending]
    ];
    for (const [label, paths] of sections) {
      if (paths.length === 0) continue;
      console.log(chalk.yellow(`${label} (${paths.length}):`));
      for (const path of paths) console.log(`  ${path}`);
    }

    if (report.indexDimensions !== null && report.indexDimensions !== report.activeDimensions) {
      console.log(chalk.yellow(
        `Index holds ${report.indexDimensions}-dimension vectors (${report.indexModel}); ` +
        `store uses ${report.activeModel} (${report.activeDimensions}). Run 'arbor reindex'.`
      ));
    }

    const drift = report.missing.length + report.orphaned.length + report.stale.length;
    if (options.repair && (drift > 0 || report.pending.length > 0)) {
      const result = await kb.repair();
      console.log(chalk.green(
        `Repaired: ${result.added} added, ${result.updated} updated, ${result.removed} removed, ${result.embedded} embedded`
      ));
    } else if (drift === 0) {
      console.log(chalk.green('Index matches the leaf files.'));
    }

    await kb.close();
  } catch (error) {
    fail(null, 'Check failed', error);
  }
});

export const pruneCommand = withStoreOption(
  new Command('prune')
    .description('Report stale, low-confidence or conflicting leaves (never deletes)')
    .option('-t, --tree <tree>', 'Only this tree')
    .option('-b, --branch <branch>', 'Only this branch')
    .option('--stale-days <days>', 'Flag leaves not updated in N days', '90')
    .option('--min-confidence <number>', 'Flag leaves below this confidence', '0.3')
    .option('--detect-conflicts', 'Find very similar leaves in different branches', false)
).action(async (options: PruneCommandOptions) => {
  try {
    const kb = await openStore(options);
    const report = kb.analyzePrune({
      tree: options.tree,
      branch: options.branch,
      staleDays: parseNumber(options.staleDays),
      minConfidence: parseNumber(options.minConfidence),
      detectConflicts: options.detectConflicts
    });
    await kb.close();

    if (report.candidates.length + report.contradictions.length + report.similar.length === 0) {
      console.log(chalk.green(`No issues found in ${report.scanned} leaves.`));
      return;
    }

    if (report.candidates.length > 0) {
      console.log(chalk.cyan(`Issues found (${report.candidates.length} leaves)`));
      for (const candidate of report.candidates) {
        console.log(`  ${candidate.path}: ${candidate.reasons.map(describeReason).join(', ')}`);
        console.log(chalk.dim(`    promote: arbor update ${candidate.path} --tier trunk -c 0.8`));
        console.log(chalk.dim(`    delete:  arbor delete ${candidate.path}`));
      }
    }
    if (report.contradictions.length > 0) {
      console.log(chalk.cyan(`Contradictions (${report.contradictions.length})`));
      for (const pair of report.contradictions) {
        console.log(`  ${pair.from} contradicts ${pair.to}`);
      }
    }
    if (report.similar.length > 0) {
      console.log(chalk.cyan(`Possible conflicts (${report.similar.length})`));
      for (const pair of report.similar) {
        console.log(`  ${pair.a} ~ ${pair.b} (${pair.similarity.toFixed(2)})`);
      }
    }
    if (report.skipped > 0) {
      console.log(chalk.dim(`${report.skipped} leaves without embeddings were not compared.`));
    }
  } catch (error) {
    fail(null, 'Prune analysis failed', error);
  }
});
