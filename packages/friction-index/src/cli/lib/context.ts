/**
 * CLI Global Context and Exit Codes
 *
 * The root command's preAction hook loads configuration once and stores it
 * here; subcommands read it back through getGlobalContext().
 *
 * @module cli/lib/context
 */

import { isConfigError, isSchemaError } from '../../core/errors.js';
import { loadConfig, validateConfig, type CLIConfig } from './config.js';
import { createCLILogger, type CLILogger } from './logger.js';

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  ERRORS: 2,
  CONFIG_ERROR: 3,
  DATA_INTEGRITY_ERROR: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Exit code for an error caught at a command boundary
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (isConfigError(error)) return EXIT_CODES.CONFIG_ERROR;
  if (isSchemaError(error)) return EXIT_CODES.DATA_INTEGRITY_ERROR;
  return EXIT_CODES.ERRORS;
}

// ============================================================================
// Global State
// ============================================================================

export interface GlobalContext {
  readonly config: CLIConfig;
  readonly logger: CLILogger;
  readonly startTime: number;
}

/**
 * Global options of the root command
 */
export interface GlobalOptions {
  readonly verbose?: boolean;
  readonly json?: boolean;
  readonly config?: string;
}

let globalContext: GlobalContext | null = null;

export function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

export function hasGlobalContext(): boolean {
  return globalContext !== null;
}

/**
 * Load configuration and create the logger for this invocation
 *
 * @throws ConfigError if the config file is missing or invalid
 */
export async function initializeContext(options: GlobalOptions): Promise<GlobalContext> {
  const startTime = Date.now();

  const config = await loadConfig({
    configPath: options.config,
    overrides: {
      verbose: options.verbose,
      json: options.json,
    },
  });
  validateConfig(config);

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });

  globalContext = { config, logger, startTime };
  return globalContext;
}
