#!/usr/bin/env tsx
/**
 * Friction Index CLI Entry Point
 *
 * Computes the Aadhaar Friction Index from biometric, demographic and
 * enrolment tables and prints or writes its result tables.
 *
 * @module friction-index-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import {
  EXIT_CODES,
  exitCodeFor,
  getGlobalContext,
  hasGlobalContext,
  initializeContext,
  type GlobalOptions,
} from '../src/cli/lib/context.js';
import { isFrictionIndexError } from '../src/core/errors.js';
import { registerIndexCommands } from '../src/cli/commands/index.js';

// ============================================================================
// CLI Setup
// ============================================================================

function getVersion(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  const packageJsonPath = join(__dirname, '..', 'package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('friction-index')
    .description('Aadhaar Friction Index - district-level friction scoring')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .friction-indexrc)')
    .hook('preAction', async (thisCommand) => {
      const options: GlobalOptions = thisCommand.opts();
      try {
        await initializeContext(options);
      } catch (error) {
        console.error(
          isFrictionIndexError(error)
            ? error.toLogString()
            : `Configuration error: ${error instanceof Error ? error.message : String(error)}`
        );
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  registerIndexCommands(program);

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (hasGlobalContext()) {
      const { logger, startTime } = getGlobalContext();
      logger.error('Command failed', {
        error: error instanceof Error ? error.message : String(error),
        duration_ms: Date.now() - startTime,
      });
    } else {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    }
    process.exit(exitCodeFor(error));
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
