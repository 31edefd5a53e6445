/**
 * Status Command
 *
 * Usage:
 *   stac-ingestor status <id> [--created-by <principal>]
 */

import type { Command } from 'commander';
import { getGlobalContext, type GlobalContext } from '../../lib/context.js';
import { formatJson, printOutput } from '../../lib/output.js';
import type { IngestionRecord } from '../../../core/types/index.js';

export interface StatusCommandOptions {
  readonly createdBy: string;
  /** Include the item payload */
  readonly item?: boolean;
}

export async function statusCommand(
  id: string,
  options: StatusCommandOptions,
  context: GlobalContext = getGlobalContext()
): Promise<IngestionRecord> {
  const service = await context.services.ingestions();
  const record = await service.get(options.createdBy, id);

  if (options.item) {
    printOutput(formatJson(record));
  } else {
    const { item, ...summary } = record;
    printOutput(formatJson({ ...summary, collection: item.collection ?? null }));
  }
  return record;
}

export function registerStatusCommand(parent: Command): void {
  parent
    .command('status <id>')
    .description('Show one ingestion')
    .option('--created-by <principal>', 'Submitting principal', 'cli')
    .option('--item', 'Include the item payload')
    .action(async (id: string, options: StatusCommandOptions) => {
      await statusCommand(id, options);
    });
}
