/**
 * Dataset Publish Command
 *
 * Validate a dataset, load its collection and start discovery workflows.
 *
 * Usage:
 *   stac-ingestor dataset publish <dataset.yaml> [--json]
 */

import type { Command } from 'commander';
import type { PublishResult } from '../../../publisher/collection-publisher.js';
import { getGlobalContext, type GlobalContext } from '../../lib/context.js';
import { readDocument } from '../../lib/input.js';
import { formatJson, printOutput, printSuccess, printWarning } from '../../lib/output.js';

export interface PublishCommandOptions {
  readonly json?: boolean;
}

export async function publishDatasetCommand(
  file: string,
  options: PublishCommandOptions,
  context: GlobalContext = getGlobalContext()
): Promise<PublishResult> {
  const result = await context.services.publisher().publish(await readDocument(file));

  if (options.json) {
    printOutput(formatJson(result));
    return result;
  }

  printSuccess(`Published collection '${result.collection.id}'`);
  for (const dispatch of result.discoveries) {
    if ('run' in dispatch) {
      printOutput(`  discovery #${dispatch.index} -> ${dispatch.collection}: run ${dispatch.run.id} (${dispatch.run.status})`);
    } else {
      printWarning(`discovery #${dispatch.index} -> ${dispatch.collection} not started: ${dispatch.error}`);
    }
  }
  return result;
}

export function registerDatasetPublishCommand(parent: Command): void {
  parent
    .command('publish <file>')
    .description('Publish a dataset collection and trigger its discovery workflows')
    .option('--json', 'Print the collection and dispatch results as JSON')
    .action(async (file: string, options: PublishCommandOptions) => {
      await publishDatasetCommand(file, options);
    });
}
