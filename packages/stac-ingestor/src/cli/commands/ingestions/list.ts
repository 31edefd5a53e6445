/**
 * List Command
 *
 * Page through ingestions in one status, oldest first.
 *
 * Usage:
 *   stac-ingestor list [--status <status>] [--limit <n>] [--cursor <cursor>] [--format <fmt>]
 *
 * Examples:
 *   stac-ingestor list --status failed --limit 20
 *   stac-ingestor list --status failed --cursor eyJjcmVhdGVkX2J5Ijo...
 */

import type { Command } from 'commander';
import { INGESTION_STATUSES, type IngestionPage, type IngestionStatus } from '../../../core/types/index.js';
import { getGlobalContext, type GlobalContext } from '../../lib/context.js';
import { parsePositiveInt } from '../../lib/input.js';
import {
  formatJson,
  formatOutput,
  formatters,
  isOutputFormat,
  printOutput,
  type TableColumn,
} from '../../lib/output.js';

export interface ListCommandOptions {
  readonly status: string;
  readonly limit?: number;
  readonly cursor?: string;
  readonly format: string;
}

const COLUMNS: readonly TableColumn[] = [
  { key: 'created_by', header: 'Created by' },
  { key: 'id', header: 'Id' },
  { key: 'status', header: 'Status' },
  { key: 'created_at', header: 'Created' },
  { key: 'message', header: 'Message', formatter: formatters.truncate(60) },
];

// `unknown` is produced on read and never stored, so nothing lists under it
const LISTABLE_STATUSES = INGESTION_STATUSES.filter((status) => status !== 'unknown');

function parseStatusOption(value: string): IngestionStatus {
  const status = LISTABLE_STATUSES.find((candidate) => candidate === value.toLowerCase());
  if (!status) {
    throw new Error(`Unknown status '${value}'. Expected one of: ${LISTABLE_STATUSES.join(', ')}`);
  }
  return status;
}

export async function listCommand(
  options: ListCommandOptions,
  context: GlobalContext = getGlobalContext()
): Promise<IngestionPage> {
  if (!isOutputFormat(options.format)) {
    throw new Error(`Unknown format '${options.format}'`);
  }

  const service = await context.services.ingestions();
  const page = await service.list({
    status: parseStatusOption(options.status),
    limit: options.limit,
    cursor: options.cursor,
  });

  if (options.format === 'json') {
    printOutput(formatJson(page));
    return page;
  }

  const rows = page.items.map(({ item: _item, ...summary }) => summary);
  printOutput(formatOutput(rows, options.format, COLUMNS));
  if (options.format === 'table' && page.next) {
    printOutput(`\nNext page: --cursor ${page.next}`);
  }
  return page;
}

export function registerListCommand(parent: Command): void {
  parent
    .command('list')
    .description('List ingestions by status')
    .option('--status <status>', `One of ${LISTABLE_STATUSES.join('|')}`, 'queued')
    .option('--limit <n>', 'Page size', parsePositiveInt)
    .option('--cursor <cursor>', 'Resume after a previous page')
    .option('--format <fmt>', 'Output format: table|json|ndjson', 'table')
    .action(async (options: ListCommandOptions) => {
      await listCommand(options);
    });
}
