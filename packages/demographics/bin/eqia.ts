#!/usr/bin/env tsx
/**
 * eqia CLI Entry Point
 *
 * Station catchment profiles for transit equality impact assessments.
 *
 * @module eqia-cli
 */

import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import { errorMessage } from '../src/core/errors.js';
import { logger } from '../src/core/utils/logger.js';
import { registerCommands } from '../src/cli/commands/index.js';
import {
  EXIT_CODES,
  exitCodeFor,
  initializeContext,
  parsePositiveInteger,
  type CliContext,
  type GlobalOptions,
} from '../src/cli/lib/context.js';
import { printError } from '../src/cli/lib/output.js';

let context: CliContext | null = null;

function getVersion(): string {
  try {
    const raw: unknown = JSON.parse(
      readFileSync(new URL('../package.json', import.meta.url), 'utf-8')
    );
    if (typeof raw === 'object' && raw !== null && 'version' in raw && typeof raw.version === 'string') {
      return raw.version;
    }
  } catch (error) {
    logger.debug('Could not read package version', { error: errorMessage(error) });
  }
  return '0.0.0';
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('eqia')
    .description('Demographic and deprivation profiles of transit station catchments')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .eqiarc)')
    .option('--timeout <ms>', 'Statistics request timeout in milliseconds', parsePositiveInteger)
    .hook('preAction', (thisCommand) => {
      const options: GlobalOptions = thisCommand.opts();
      try {
        context = initializeContext(options);
      } catch (error) {
        printError(`Configuration error: ${errorMessage(error)}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  registerCommands(program);
  return program;
}

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    printError(errorMessage(error));
    if (context) {
      logger.debug('Command failed', {
        error: errorMessage(error),
        duration_ms: Date.now() - context.startTime,
      });
    }
    process.exit(exitCodeFor(error));
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
