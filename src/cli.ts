#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import Debug from 'debug';
import { HolePunchingSource } from './lib/hole-punch/source';
import { loadSourceConfigFromEnv } from './lib/hole-punch/config';
import { describeError } from './lib/errors';
import { parseEndpoint, formatEndpoint } from './lib/utils/endpoint';

function parseMillisOption(value: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Not a number of milliseconds.');
  }
  return parsed;
}

const program = new Command();

program
  .name('holepunch-source')
  .description('Open a direct TCP connection to a peer behind NAT through a mediator')
  .version('0.1.0');

program
  .command('connect')
  .description('Connect to a target and pipe stdin/stdout through the socket')
  .argument('<targetId>', 'Id of the target registered at the mediator')
  .requiredOption('-m, --mediator <host:port>', 'Mediator address')
  .option('-d, --deadline <ms>', 'Deadline of the connection race', parseMillisOption)
  .option('-r, --retry-interval <ms>', 'Pause between outbound attempts', parseMillisOption)
  .option('--no-bind-outbound', 'Do not bind outbound attempts to the mediator connection port')
  .option('-v, --verbose', 'Print debug output')
  .action(
    async (
      targetId: string,
      options: { mediator: string; deadline?: number; retryInterval?: number; bindOutbound: boolean; verbose?: boolean }
    ) => {
      if (options.verbose) {
        Debug.enable('holepunch-source:*');
      }

      try {
        const mediator = parseEndpoint(options.mediator);
        const fromEnv = loadSourceConfigFromEnv();
        const source = new HolePunchingSource({
          ...fromEnv,
          deadlineMs: options.deadline ?? fromEnv.deadlineMs,
          retryIntervalMs: options.retryInterval ?? fromEnv.retryIntervalMs,
          bindOutbound: options.bindOutbound ? fromEnv.bindOutbound : false
        });

        const controller = new AbortController();
        process.once('SIGINT', () => controller.abort());

        console.error(chalk.blue(`Connecting to ${targetId} via ${formatEndpoint(mediator)}...`));
        const socket = await source.getSocket(targetId, mediator, { signal: controller.signal });
        console.error(chalk.green(`Connected to ${socket.remoteAddress}:${socket.remotePort}`));

        socket.on('close', () => process.exit(0));
        process.stdin.pipe(socket);
        socket.pipe(process.stdout);
      } catch (error) {
        console.error(chalk.red(`Failed to connect: ${describeError(error)}`));
        process.exit(1);
      }
    }
  );

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(describeError(error)));
  process.exit(1);
});
