/**
 * Submit Command
 *
 * Validate a STAC item and queue it for loading.
 *
 * Usage:
 *   stac-ingestor submit <item.json> [--created-by <principal>] [--id <id>]
 */

import type { Command } from 'commander';
import { getGlobalContext, type GlobalContext } from '../../lib/context.js';
import { readDocument } from '../../lib/input.js';
import { formatJson, printOutput } from '../../lib/output.js';
import type { IngestionRecord } from '../../../core/types/index.js';

export interface SubmitCommandOptions {
  readonly createdBy: string;
  readonly id?: string;
}

export async function submitCommand(
  file: string,
  options: SubmitCommandOptions,
  context: GlobalContext = getGlobalContext()
): Promise<IngestionRecord> {
  const item = await readDocument(file);
  const service = await context.services.ingestions();
  const record = await service.submit(options.createdBy, item, { id: options.id });

  printOutput(formatJson(record));
  return record;
}

export function registerSubmitCommand(parent: Command): void {
  parent
    .command('submit <file>')
    .description('Validate a STAC item (JSON or YAML, "-" for stdin) and queue it')
    .option('--created-by <principal>', 'Submitting principal', 'cli')
    .option('--id <id>', 'Ingestion id (default: the item id)')
    .action(async (file: string, options: SubmitCommandOptions) => {
      await submitCommand(file, options);
    });
}
