/**
 * Dataset Validate Command
 *
 * Run every dataset check without publishing anything.
 *
 * Usage:
 *   stac-ingestor dataset validate <dataset.yaml>
 */

import type { Command } from 'commander';
import type { DatasetSubmission } from '../../../validation/schemas/index.js';
import { getGlobalContext, type GlobalContext } from '../../lib/context.js';
import { readDocument } from '../../lib/input.js';
import { printSuccess } from '../../lib/output.js';

export async function validateDatasetCommand(
  file: string,
  context: GlobalContext = getGlobalContext()
): Promise<DatasetSubmission> {
  const dataset = await context.services.datasetValidator().validate(await readDocument(file));
  printSuccess(`Dataset '${dataset.collection}' (${dataset.data_type}) is valid`);
  return dataset;
}

export function registerDatasetValidateCommand(parent: Command): void {
  parent
    .command('validate <file>')
    .description('Validate a dataset definition (JSON or YAML)')
    .action(async (file: string) => {
      await validateDatasetCommand(file);
    });
}
