/**
 * Cancel Command
 *
 * Only queued ingestions can be cancelled.
 *
 * Usage:
 *   stac-ingestor cancel <id> [--created-by <principal>]
 */

import type { Command } from 'commander';
import { getGlobalContext, type GlobalContext } from '../../lib/context.js';
import { printSuccess } from '../../lib/output.js';
import type { IngestionRecord } from '../../../core/types/index.js';

export interface CancelCommandOptions {
  readonly createdBy: string;
}

export async function cancelCommand(
  id: string,
  options: CancelCommandOptions,
  context: GlobalContext = getGlobalContext()
): Promise<IngestionRecord> {
  const service = await context.services.ingestions();
  const record = await service.cancel(options.createdBy, id);

  printSuccess(`Cancelled ${record.created_by}/${record.id}`);
  return record;
}

export function registerCancelCommand(parent: Command): void {
  parent
    .command('cancel <id>')
    .description('Cancel a queued ingestion')
    .option('--created-by <principal>', 'Submitting principal', 'cli')
    .action(async (id: string, options: CancelCommandOptions) => {
      await cancelCommand(id, options);
    });
}
