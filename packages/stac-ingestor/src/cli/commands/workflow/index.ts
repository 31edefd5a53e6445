/**
 * Workflow Commands
 *
 * Usage:
 *   stac-ingestor workflow status <run-id>
 */

import type { Command } from 'commander';
import type { WorkflowRun } from '../../../workflows/discovery-workflow.js';
import { getGlobalContext, type GlobalContext } from '../../lib/context.js';
import { formatJson, printOutput } from '../../lib/output.js';

export async function workflowStatusCommand(
  runId: string,
  context: GlobalContext = getGlobalContext()
): Promise<WorkflowRun> {
  const workflows = context.services.workflows();
  if (!workflows) {
    throw new Error('No workflow service configured (STAC_INGESTOR_AIRFLOW_URL)');
  }
  const run = await workflows.getStatus(runId);
  printOutput(formatJson(run));
  return run;
}

export function registerWorkflowCommands(program: Command): void {
  const workflow = program
    .command('workflow')
    .description('Discovery workflow runs');

  workflow
    .command('status <run-id>')
    .description('Show the state of a discovery workflow run')
    .action(async (runId: string) => {
      await workflowStatusCommand(runId);
    });
}
