/**
 * Retrieval Commands
 *
 * search, tags, show, prime and context. prime and context are written for
 * session hooks: plain text on stdout, nothing when there is nothing to say.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { tierMarker } from '../../core/tiers.js';
import type { ContextMode, PrimeReport } from '../../core/types.js';
import {
  collect,
  fail,
  formatLeafLine,
  openStore,
  parseNumber,
  printLeaves,
  withStoreOption,
  type StoreOptions
} from '../shared.js';

interface SearchCommandOptions extends StoreOptions {
  limit?: string;
  tier: string[];
  tag: string[];
  tree?: string;
  branch?: string;
  minConfidence?: string;
  json: boolean;
}

interface ContextCommandOptions extends StoreOptions {
  mode: string;
  limit?: string;
  threshold?: string;
}

const CONTEXT_MODES: Record<string, ContextMode> = {
  tags: 'tags',
  semantic: 'semantic',
  // Hashing-only matching is what semantic mode does on a lite store
  lite: 'semantic'
};

export const searchCommand = withStoreOption(
  new Command('search')
    .description('Semantic search with tier, tag and branch filters')
    .argument('<query>', 'What to look for')
    .option('-n, --limit <number>', 'Maximum results')
    .option('--tier <tier>', 'Only this tier (repeatable)', collect, [])
    .option('--tag <tag>', 'Match leaves with this tag (repeatable, any of them)', collect, [])
    .option('-t, --tree <tree>', 'Only this tree')
    .option('-b, --branch <branch>', 'Only this branch (or tree/branch)')
    .option('--min-confidence <number>', 'Minimum confidence')
    .option('--json', 'Print JSON', false)
).action(async (query: string, options: SearchCommandOptions) => {
  const spinner = options.json ? null : ora('Searching...').start();

  try {
    const kb = await openStore(options);
    const results = await kb.search(query, {
      limit: parseNumber(options.limit),
      tier: options.tier.length > 0 ? options.tier : undefined,
      tags: options.tag,
      tree: options.tree,
      branch: options.branch,
      minConfidence: parseNumber(options.minConfidence)
    });
    await kb.close();

    if (options.json) {
      console.log(JSON.stringify(results, null, 2));
      return;
    }

    spinner?.succeed(`${results.length} result${results.length === 1 ? '' : 's'}`);
    printLeaves(results);
  } catch (error) {
    fail(spinner, 'Search failed', error);
  }
});

export const tagsCommand = withStoreOption(
  new Command('tags')
    .description('List tags with counts, or the leaves carrying one tag')
    .argument('[tag]', 'Tag to list leaves for')
).action(async (tag: string | undefined, options: StoreOptions) => {
  try {
    const kb = await openStore(options);

    if (tag === undefined) {
      const tags = await kb.listTags();
      if (tags.length === 0) console.log(chalk.dim('No tags yet.'));
      for (const entry of tags) {
        console.log(`  ${entry.tag}: ${entry.count}`);
      }
    } else {
      printLeaves(await kb.getByTag(tag));
    }

    await kb.close();
  } catch (error) {
    fail(null, 'Failed to list tags', error);
  }
});

export const showCommand = withStoreOption(
  new Command('show')
    .description('Show trees, branches and leaves')
    .argument('[tree]', 'Only this tree')
).action(async (tree: string | undefined, options: StoreOptions) => {
  try {
    const kb = await openStore(options);
    const overview = kb.showTree(tree);
    await kb.close();

    if (overview.length === 0) {
      console.log(chalk.dim('No trees yet. Start with: arbor tree <name>'));
    }
    for (const entry of overview) {
      console.log(chalk.cyan(`${entry.name}/`));
      for (const branch of entry.branches) {
        console.log(`  ${chalk.white(`${branch.name}/`)} ${chalk.dim(`(${branch.leaves.length})`)}`);
        for (const leaf of branch.leaves) {
          console.log(`    ${formatLeafLine(leaf)}`);
        }
      }
    }
  } catch (error) {
    fail(null, 'Failed to show store', error);
  }
});

export function formatPrime(report: PrimeReport, query?: string): string {
  const lines: string[] = [];
  lines.push('ARBOR - Persistent Knowledge Base');
  lines.push('');
  lines.push('Persistent knowledge store. Save valuable insights for future sessions:');
  lines.push('patterns, observations, technical gotchas, lessons learned.');
  lines.push('Search before reinventing.');
  lines.push('');

  if (report.trees.length === 0) {
    lines.push('No knowledge yet. Start with: arbor tree <name>');
  } else {
    lines.push(`${report.leafCount} items across ${report.trees.length} trees`);

    const tiers = (['roots', 'trunk', 'branches', 'leaves'] as const)
      .filter(tier => report.byTier[tier] > 0)
      .map(tier => `${tier}: ${report.byTier[tier]}`);
    if (tiers.length > 0) {
      lines.push(`Tiers: ${tiers.join(', ')}`);
    }

    lines.push('');
    lines.push('Trees:');
    for (const tree of report.trees) {
      lines.push(`  ${tree.name}/ (${tree.branches} branches)`);
    }

    if (report.tags.length > 0) {
      lines.push('');
      lines.push(`Tags: ${report.tags.join(', ')}`);
    }

    if (report.foundational.length > 0) {
      lines.push('');
      lines.push('Foundational (roots tier):');
      for (const leaf of report.foundational) {
        lines.push(`  - ${leaf.excerpt}`);
      }
    }

    if (report.recent.length > 0) {
      lines.push('');
      lines.push('Recent:');
      for (const leaf of report.recent) {
        lines.push(`  [${leaf.updatedAt.slice(5, 10)}] ${leaf.path}`);
      }
    }

    if (report.highlights.length > 0) {
      lines.push('');
      lines.push(query ? `Most relevant to "${query}":` : 'Highlights:');
      for (const leaf of report.highlights) {
        lines.push(`  ${tierMarker(leaf.tier)} ${leaf.path}`);
      }
    }
  }

  lines.push('');
  lines.push('Commands: arbor search <query> | arbor get <path> | arbor add <branch> <content>');
  return lines.join('\n');
}

export const primeCommand = withStoreOption(
  new Command('prime')
    .description('Print a session primer: what the store holds and what matters most')
    .argument('[query]', 'Bias the highlights toward a topic')
    .option('-n, --limit <number>', 'Highlights to show', '5')
).action(async (query: string | undefined, options: StoreOptions & { limit: string }) => {
  try {
    const kb = await openStore(options);
    const report = await kb.prime({ query, limit: parseNumber(options.limit) });
    await kb.close();
    console.log(formatPrime(report, query));
  } catch (error) {
    fail(null, 'Failed to prime', error);
  }
});

export const contextCommand = withStoreOption(
  new Command('context')
    .description('Print paths of leaves relevant to a prompt (for prompt hooks)')
    .argument('<prompt>', 'Prompt text')
    .option('-m, --mode <mode>', 'Matching mode: tags, semantic (lite is an alias of semantic)', 'tags')
    .option('-n, --limit <number>', 'Maximum results', '3')
    .option('-t, --threshold <number>', 'Minimum similarity (semantic mode)')
).action(async (prompt: string, options: ContextCommandOptions) => {
  try {
    const mode = CONTEXT_MODES[options.mode];
    if (mode === undefined) {
      throw new Error(`Unknown mode '${options.mode}'. Use tags, lite or semantic.`);
    }

    const kb = await openStore(options);
    const matches = await kb.context(prompt, {
      mode,
      limit: parseNumber(options.limit),
      threshold: parseNumber(options.threshold)
    });
    await kb.close();

    if (matches.length > 0) {
      console.log(`Related: ${matches.map(match => match.path).join(', ')}`);
    }
  } catch (error) {
    fail(null, 'Context lookup failed', error);
  }
});
