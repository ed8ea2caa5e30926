/**
 * Server Commands
 *
 * Manage the embedding daemon shared by every store on this machine.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import type { StartResult } from '../../server/ServerManager.js';
import { createServerManager, fail } from '../shared.js';

function reportStart(result: StartResult): string {
  const verb = result.started ? 'Started' : 'Already running';
  return `${verb}: ${result.model} (${result.dimensions} dimensions, pid ${result.pid})`;
}

const startCommand = new Command('start')
  .description('Start the embedding server')
  .argument('[alias]', 'Model to load (default: configured model)')
  .action(async (alias: string | undefined) => {
    const spinner = ora('Starting embedding server...').start();
    try {
      const result = await createServerManager().start(alias);
      spinner.succeed(reportStart(result));
      if (result.restartRequired) {
        console.log(chalk.yellow(`Requested ${result.requested}; run 'arbor server restart' to switch.`));
      }
    } catch (error) {
      fail(spinner, 'Failed to start embedding server', error);
    }
  });

const stopCommand = new Command('stop')
  .description('Stop the embedding server')
  .action(async () => {
    const spinner = ora('Stopping embedding server...').start();
    try {
      const stopped = await createServerManager().stop();
      spinner.succeed(stopped ? 'Stopped' : 'Not running');
    } catch (error) {
      fail(spinner, 'Failed to stop embedding server', error);
    }
  });

const restartCommand = new Command('restart')
  .description('Restart the embedding server')
  .argument('[alias]', 'Model to load')
  .action(async (alias: string | undefined) => {
    const spinner = ora('Restarting embedding server...').start();
    try {
      const result = await createServerManager().restart(alias);
      spinner.succeed(reportStart(result));
    } catch (error) {
      fail(spinner, 'Failed to restart embedding server', error);
    }
  });

const statusCommand = new Command('status')
  .description('Show embedding server status')
  .option('-o, --output <format>', 'Output format (json, text)', 'text')
  .action(async (options: { output: string }) => {
    try {
      const status = await createServerManager().status();

      if (options.output === 'json') {
        console.log(JSON.stringify(status, null, 2));
        return;
      }

      if (!status.running) {
        console.log(chalk.dim('Not running'));
        console.log(chalk.dim('Configured model:'), status.configuredModel);
        return;
      }
      console.log(chalk.green('Running'));
      console.log(chalk.dim('Model:'), `${status.model} (${status.dimensions} dimensions)`);
      console.log(chalk.dim('PID:'), status.pid);
      console.log(chalk.dim('Started:'), status.startedAt);
      console.log(chalk.dim('Queue depth:'), status.queueDepth);
      console.log(chalk.dim('Socket:'), status.socketPath);
      if (status.model !== status.configuredModel) {
        console.log(chalk.yellow(`Configured model is ${status.configuredModel}; restart to switch.`));
      }
    } catch (error) {
      fail(null, 'Failed to read server status', error);
    }
  });

const setModelCommand = new Command('model')
  .description('Show or set the model the server loads')
  .argument('[alias]', 'Model alias')
  .action(async (alias: string | undefined) => {
    try {
      const manager = createServerManager();
      if (!alias) {
        console.log(manager.configuredModel());
        return;
      }

      const result = await manager.setModel(alias);
      console.log(chalk.green(`Server model set to ${result.model}`));
      if (result.restartRequired) {
        console.log(chalk.yellow(`Running server still has ${result.current}; run 'arbor server restart'.`));
      }
    } catch (error) {
      fail(null, 'Failed to set server model', error);
    }
  });

const modelsCommand = new Command('models')
  .description('List available embedding models')
  .action(() => {
    const manager = createServerManager();
    const configured = manager.configuredModel();
    for (const spec of manager.models()) {
      const marker = spec.alias === configured ? chalk.green('*') : ' ';
      console.log(`${marker} ${chalk.cyan(spec.alias.padEnd(10))} ${String(spec.dimensions).padStart(5)}d  ${spec.footprint.padEnd(8)} ${chalk.dim(spec.description)}`);
    }
  });

export const serverCommand = new Command('server')
  .description('Manage the embedding server')
  .addCommand(startCommand)
  .addCommand(stopCommand)
  .addCommand(restartCommand)
  .addCommand(statusCommand)
  .addCommand(setModelCommand)
  .addCommand(modelsCommand);
