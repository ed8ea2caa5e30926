/**
 * Helpers shared by the CLI commands.
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import type { Ora } from 'ora';
import { KnowledgeBase } from '../core/KnowledgeBase.js';
import { getDefaultConfig } from '../core/config.js';
import { isKnowledgeBaseError } from '../core/errors.js';
import { tierMarker } from '../core/tiers.js';
import type { LeafSummary, SearchResult } from '../core/types.js';
import { ServerManager } from '../server/ServerManager.js';

export interface StoreOptions {
  store?: string;
}

/**
 * Add the `--store` option every store-backed command accepts
 */
export function withStoreOption(command: Command): Command {
  return command.option('-s, --store <path>', 'Store directory (default: nearest .arbor/ or $ARBOR_PATH)');
}

export async function openStore(options: StoreOptions): Promise<KnowledgeBase> {
  return KnowledgeBase.open(options.store ? { storePath: options.store } : undefined);
}

export function createServerManager(): ServerManager {
  const { serverConfig } = getDefaultConfig();
  return new ServerManager(serverConfig);
}

/**
 * Report a failed command and exit with status 1
 */
export function fail(spinner: Ora | null, label: string, error: unknown): never {
  if (spinner) {
    spinner.fail(chalk.red(label));
  } else {
    console.error(chalk.red(label));
  }

  if (isKnowledgeBaseError(error)) {
    console.error(`${error.code}: ${error.message}`);
  } else {
    console.error(error instanceof Error ? error.message : error);
  }
  process.exit(1);
}

export function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

/**
 * Commander collector for repeatable options (`--tier a --tier b`)
 */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, ...splitList(value)];
}

/**
 * Parse a numeric option. Range checks are left to the core.
 *
 * @throws {InvalidArgumentError} If the value is not a number
 */
export function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new InvalidArgumentError(`'${value}' is not a number`);
  }
  return parsed;
}

export function formatLeafLine(leaf: LeafSummary | SearchResult): string {
  const score = 'score' in leaf ? chalk.yellow(`${leaf.score.toFixed(3)} `) : '';
  const tags = leaf.tags.length > 0 ? chalk.dim(` [${leaf.tags.join(', ')}]`) : '';
  return `${score}${chalk.cyan(tierMarker(leaf.tier))} ${chalk.white(leaf.path)}${tags}`;
}

export function printLeaves(leaves: Array<LeafSummary | SearchResult>): void {
  for (const leaf of leaves) {
    console.log(formatLeafLine(leaf));
    console.log(chalk.dim(`    ${leaf.excerpt}`));
  }
}
