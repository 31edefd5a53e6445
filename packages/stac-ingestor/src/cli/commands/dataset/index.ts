/**
 * Dataset Commands Index
 */

import type { Command } from 'commander';
import { registerDatasetValidateCommand } from './validate.js';
import { registerDatasetPublishCommand } from './publish.js';

export function registerDatasetCommands(program: Command): void {
  const dataset = program
    .command('dataset')
    .description('Validate and publish dataset definitions');

  registerDatasetValidateCommand(dataset);
  registerDatasetPublishCommand(dataset);
}
