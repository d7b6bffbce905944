/**
 * version-db CLI Configuration Management
 *
 * Loads configuration from .version-dbrc (YAML) with environment variable
 * overrides and defaults.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (VERSION_DB_*)
 * 3. Config file (.version-dbrc or --config path)
 * 4. Default values
 *
 * `paths.root` in a config file is relative to the file's directory; from the
 * command line or the environment it is relative to the working directory.
 * `paths.ports` and `paths.versions` are relative to the root.
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../../core/errors.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface PathsConfig {
  /** Catalog root (git work tree) */
  readonly root: string;
  /** Port directories, relative to root */
  readonly ports: string;
  /** History and baseline files, relative to root */
  readonly versions: string;
}

export interface CLIConfig {
  readonly paths: PathsConfig;
  /** Success output for every port, and debug logging */
  readonly verbose: boolean;
  /** Machine-readable output */
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

/**
 * Absolute catalog locations
 */
export interface ResolvedPaths {
  readonly root: string;
  readonly portsDir: string;
  readonly versionsDir: string;
}

/**
 * Config file structure (YAML or JSON)
 */
export const ConfigFileSchema = z
  .object({
    version: z.literal(1).optional(),
    paths: z
      .object({
        root: z.string().min(1).optional(),
        ports: z.string().min(1).optional(),
        versions: z.string().min(1).optional(),
      })
      .strict()
      .optional(),
    verbose: z.boolean().optional(),
    json: z.boolean().optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Pick<CLIConfig, 'paths'> = {
  paths: {
    root: '.',
    ports: 'ports',
    versions: 'versions',
  },
};

// ============================================================================
// Configuration Loading
// ============================================================================

/**
 * Standard config file names to search for
 */
export const CONFIG_FILE_NAMES = [
  '.version-dbrc',
  '.version-dbrc.yaml',
  '.version-dbrc.yml',
  '.version-dbrc.json',
] as const;

/**
 * Find config file in the start directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Parse and validate config file content (YAML, which also reads JSON)
 */
export function parseConfigFile(filePath: string): ConfigFile {
  let content: unknown;
  try {
    content = parseYaml(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(
      `Cannot read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath
    );
  }

  // An empty file parses to null
  const result = ConfigFileSchema.safeParse(content ?? {});
  if (!result.success) {
    const issues = result.error.errors
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config file ${filePath}: ${issues}`, filePath);
  }
  return result.data;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory to resolve against and search from (default: process.cwd()) */
  cwd?: string;
  /** Environment (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** CLI flag overrides */
  overrides?: {
    root?: string;
    json?: boolean;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws ConfigError for a missing explicit config file or an invalid one
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;
  const getEnvVar = (name: string): string | undefined => {
    const value = env[`VERSION_DB_${name}`];
    return value === undefined || value === '' ? undefined : value;
  };
  const getEnvBool = (name: string): boolean | undefined => {
    const value = getEnvVar(name);
    if (value === undefined) return undefined;
    return value.toLowerCase() === 'true' || value === '1';
  };

  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  const explicitPath = options.configPath ?? getEnvVar('CONFIG');
  if (explicitPath) {
    configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`, configPath);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(cwd);
    if (configPath) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  const fileBase = configPath ? dirname(configPath) : cwd;
  const cliRoot = options.overrides?.root ?? getEnvVar('ROOT');
  const root =
    cliRoot !== undefined
      ? resolve(cwd, cliRoot)
      : resolve(fileBase, fileConfig.paths?.root ?? DEFAULT_CONFIG.paths.root);

  return {
    paths: {
      root,
      ports: getEnvVar('PORTS_DIR') ?? fileConfig.paths?.ports ?? DEFAULT_CONFIG.paths.ports,
      versions:
        getEnvVar('VERSIONS_DIR') ?? fileConfig.paths?.versions ?? DEFAULT_CONFIG.paths.versions,
    },
    verbose: getEnvBool('VERBOSE') ?? fileConfig.verbose ?? false,
    json: options.overrides?.json ?? getEnvBool('JSON') ?? fileConfig.json ?? false,
    configPath,
  };
}

/**
 * Absolute ports and versions directories
 */
export function resolvePaths(config: CLIConfig): ResolvedPaths {
  const root = resolve(config.paths.root);
  return {
    root,
    portsDir: resolve(root, config.paths.ports),
    versionsDir: resolve(root, config.paths.versions),
  };
}
