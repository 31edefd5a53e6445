/**
 * Collection Commands
 *
 * Usage:
 *   stac-ingestor collection delete <id>
 *   stac-ingestor collection summaries <id>
 */

import type { Command } from 'commander';
import { getGlobalContext, type GlobalContext } from '../../lib/context.js';
import { printSuccess } from '../../lib/output.js';

export async function deleteCollectionCommand(
  collectionId: string,
  context: GlobalContext = getGlobalContext()
): Promise<void> {
  await context.services.publisher().deleteCollection(collectionId);
  printSuccess(`Deleted collection '${collectionId}'`);
}

export async function updateSummariesCommand(
  collectionId: string,
  context: GlobalContext = getGlobalContext()
): Promise<void> {
  await context.services.publisher().updateCollectionSummaries(collectionId);
  printSuccess(`Refreshed summaries and extent of '${collectionId}'`);
}

export function registerCollectionCommands(program: Command): void {
  const collection = program
    .command('collection')
    .description('Catalog collection maintenance');

  collection
    .command('delete <id>')
    .description('Delete a collection and its items from the catalog')
    .action(async (id: string) => {
      await deleteCollectionCommand(id);
    });

  collection
    .command('summaries <id>')
    .description('Recompute default summaries and extent from loaded items')
    .action(async (id: string) => {
      await updateSummariesCommand(id);
    });
}
