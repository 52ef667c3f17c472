/**
 * Friction Index CLI Configuration Management
 *
 * Loads configuration from .friction-indexrc (YAML or JSON) with environment
 * variable overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (FRICTION_INDEX_*)
 * 3. Config file (.friction-indexrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../../core/errors.js';
import { DEFAULT_CONFIG, type FrictionIndexConfigInput } from '../../core/config.js';

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Paths configuration
 */
export interface PathsConfig {
  /** Directory result tables are written to */
  readonly output: string;
}

/**
 * Full CLI configuration
 */
export interface CLIConfig {
  /** Configuration file version */
  readonly version: number;

  readonly paths: PathsConfig;

  /** Index configuration handed to the pipeline (validated there) */
  readonly index: FrictionIndexConfigInput;

  // Runtime overrides (from CLI flags)
  /** Enable verbose output */
  readonly verbose: boolean;
  /** Output as JSON */
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

/**
 * Config file structure (YAML or JSON)
 */
const ConfigFileSchema = z
  .object({
    version: z.number().int().optional(),
    paths: z
      .object({
        output: z.string().optional(),
      })
      .optional(),
    index: z
      .object({
        weights: z.record(z.string(), z.unknown()).optional(),
        class_thresholds: z
          .object({
            high: z.number().optional(),
            medium: z.number().optional(),
          })
          .optional(),
        top_n: z.number().optional(),
        top_districts: z.number().optional(),
      })
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CLI_CONFIG: Pick<CLIConfig, 'version' | 'paths'> = {
  version: 1,
  paths: {
    output: './friction-index-output',
  },
};

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
const CONFIG_FILE_NAMES = [
  '.friction-indexrc',
  '.friction-indexrc.yaml',
  '.friction-indexrc.yml',
  '.friction-indexrc.json',
];

/**
 * Find config file in current directory or parent directories
 */
function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);
  const root = resolve('/');

  while (dir !== root) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    dir = resolve(dir, '..');
  }

  return null;
}

/**
 * Parse and validate config file content
 *
 * @throws ConfigError if the file does not match the config file schema
 */
export function parseConfigFile(filePath: string): ConfigFile {
  const content = readFileSync(filePath, 'utf-8');

  // YAML is a superset of JSON, so one parser covers both
  const raw: unknown = parseYaml(content);
  const parsed = ConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(
      `Invalid config file ${filePath}: ${issue?.message ?? 'unreadable'}`,
      issue ? issue.path.map(String).join('.') || 'configFile' : 'configFile'
    );
  }
  return parsed.data;
}

/**
 * Get environment variable with prefix
 */
function getEnvVar(name: string): string | undefined {
  return process.env[`FRICTION_INDEX_${name}`];
}

/**
 * Get boolean environment variable
 */
function getEnvBool(name: string): boolean | undefined {
  const value = getEnvVar(name);
  if (value === undefined) return undefined;
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Get numeric environment variable
 */
function getEnvNumber(name: string): number | undefined {
  const value = getEnvVar(name);
  if (value === undefined) return undefined;
  const num = parseInt(value, 10);
  return isNaN(num) ? undefined : num;
}

/**
 * Load configuration options
 */
export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** CLI flag overrides */
  overrides?: {
    verbose?: boolean;
    json?: boolean;
    output?: string;
    topN?: number;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigError if an explicit config file is missing or invalid
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  if (options.configPath) {
    configPath = resolve(options.configPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`, 'configPath');
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    const envConfigPath = getEnvVar('CONFIG');
    if (envConfigPath) {
      configPath = resolve(envConfigPath);
      if (!existsSync(configPath)) {
        throw new ConfigError(`Config file not found: ${configPath} (FRICTION_INDEX_CONFIG)`, 'configPath');
      }
      fileConfig = parseConfigFile(configPath);
    } else {
      configPath = findConfigFile(process.cwd());
      if (configPath) {
        fileConfig = parseConfigFile(configPath);
      }
    }
  }

  const fileIndex = fileConfig.index;

  return {
    version: fileConfig.version ?? DEFAULT_CLI_CONFIG.version,

    paths: {
      output:
        options.overrides?.output ??
        getEnvVar('OUTPUT_DIR') ??
        fileConfig.paths?.output ??
        DEFAULT_CLI_CONFIG.paths.output,
    },

    index: {
      weights: fileIndex?.weights,
      classThresholds: fileIndex?.class_thresholds,
      topN:
        options.overrides?.topN ??
        getEnvNumber('TOP_N') ??
        fileIndex?.top_n ??
        DEFAULT_CONFIG.topN,
      topDistricts:
        getEnvNumber('TOP_DISTRICTS') ?? fileIndex?.top_districts ?? DEFAULT_CONFIG.topDistricts,
    },

    verbose: options.overrides?.verbose ?? getEnvBool('VERBOSE') ?? false,
    json: options.overrides?.json ?? getEnvBool('JSON') ?? false,
    configPath,
  };
}

/**
 * Resolve the output directory relative to the config file, or the cwd
 */
export function resolveOutputDir(config: CLIConfig): string {
  const basePath = config.configPath ? resolve(config.configPath, '..') : process.cwd();
  return resolve(basePath, config.paths.output);
}

/**
 * Validate configuration
 *
 * @throws ConfigError if the configuration version is unsupported
 */
export function validateConfig(config: CLIConfig): void {
  if (config.version !== 1) {
    throw new ConfigError(`Unsupported config version: ${config.version}. Expected 1.`, 'version');
  }
}
