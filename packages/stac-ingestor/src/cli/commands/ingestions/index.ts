/**
 * Ingestion Commands Index
 *
 * Registers the top-level ingestion commands:
 * - submit: validate and queue a STAC item
 * - status: show one ingestion
 * - list: page through ingestions by status
 * - cancel: cancel a queued ingestion
 */

import type { Command } from 'commander';
import { registerSubmitCommand } from './submit.js';
import { registerStatusCommand } from './status.js';
import { registerListCommand } from './list.js';
import { registerCancelCommand } from './cancel.js';

export function registerIngestionCommands(program: Command): void {
  registerSubmitCommand(program);
  registerStatusCommand(program);
  registerListCommand(program);
  registerCancelCommand(program);
}
