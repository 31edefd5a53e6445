/**
 * Load Command
 *
 * Drain the change feed into the catalog store.
 *
 * Usage:
 *   stac-ingestor load [--once] [--shards <list>]
 *
 * With --once a single batch is delivered and the command exits; otherwise it
 * polls until SIGINT or SIGTERM.
 */

import type { Command } from 'commander';
import { getGlobalContext, type GlobalContext } from '../../lib/context.js';
import { printOutput } from '../../lib/output.js';

export interface LoadCommandOptions {
  readonly once?: boolean;
  readonly shards?: readonly number[];
}

export function parseShardList(value: string): number[] {
  return value.split(',').map((part) => {
    const shard = Number.parseInt(part.trim(), 10);
    if (!Number.isInteger(shard) || shard < 0) {
      throw new Error(`Invalid shard '${part}'`);
    }
    return shard;
  });
}

export async function loadCommand(
  options: LoadCommandOptions,
  context: GlobalContext = getGlobalContext()
): Promise<void> {
  const consumer = await context.services.consumer(options.shards);

  if (options.once) {
    const delivered = await consumer.pollOnce();
    printOutput(`Delivered ${delivered} change events`);
    return;
  }

  const controller = new AbortController();
  const stop = (): void => controller.abort();
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);
  try {
    await consumer.run(controller.signal);
  } finally {
    process.off('SIGINT', stop);
    process.off('SIGTERM', stop);
  }
}

export function registerLoadCommands(program: Command): void {
  program
    .command('load')
    .description('Bulk load queued ingestions from the change feed into the catalog')
    .option('--once', 'Deliver one batch and exit')
    .option('--shards <list>', 'Comma separated shard numbers to consume (default: all)', parseShardList)
    .action(async (options: LoadCommandOptions) => {
      await loadCommand(options);
    });
}
