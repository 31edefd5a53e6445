/**
 * STAC Ingestor CLI
 *
 * @module cli
 */

import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import { describeError, isValidationError } from '../core/errors.js';
import {
  registerCollectionCommands,
  registerDatasetCommands,
  registerIngestionCommands,
  registerLoadCommands,
  registerWorkflowCommands,
} from './commands/index.js';
import { disposeContext, initializeContext, type GlobalOptions } from './lib/context.js';
import { EXIT_CODES, exitCodeFor, type ExitCode } from './lib/exit-codes.js';
import { printError } from './lib/output.js';

export { EXIT_CODES, type ExitCode } from './lib/exit-codes.js';

function getVersion(): string {
  try {
    const packageJson: unknown = JSON.parse(
      readFileSync(new URL('../../package.json', import.meta.url), 'utf-8')
    );
    return typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson
      ? String(packageJson.version)
      : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('stac-ingestor')
    .description('Validate STAC submissions, queue them and load them into pgstac')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Print error details')
    .option('--config <path>', 'Path to config file (default: .stac-ingestorrc)')
    .option('--database-url <url>', 'Ingestion database URL (sqlite:///path or postgresql://...)')
    .hook('preAction', (thisCommand) => {
      const options: GlobalOptions = thisCommand.opts();
      try {
        initializeContext(options);
      } catch (error) {
        console.error(`Configuration error: ${describeError(error)}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  registerIngestionCommands(program);
  registerLoadCommands(program);
  registerDatasetCommands(program);
  registerCollectionCommands(program);
  registerWorkflowCommands(program);

  return program;
}

/**
 * Parse argv, run the command and resolve to the process exit code
 */
export async function main(argv: readonly string[] = process.argv): Promise<ExitCode> {
  const program = createProgram();
  try {
    await program.parseAsync([...argv]);
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    const verbose = program.opts().verbose === true;
    if (isValidationError(error)) {
      printError(verbose ? error.toLogString() : error.message);
      for (const issue of verbose ? [] : error.issues) {
        console.error(`  - ${issue.path || '<root>'}: ${issue.message}`);
      }
    } else {
      printError(describeError(error));
    }
    return exitCodeFor(error);
  } finally {
    await disposeContext();
  }
}
