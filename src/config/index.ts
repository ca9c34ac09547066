/**
 * Configuration management module
 * Handles loading, merging, and validating configuration from multiple sources
 */

import { cosmiconfig } from 'cosmiconfig';
import { parse as parseYaml } from 'yaml';
import * as fs from 'fs/promises';
import * as path from 'path';
import { homedir } from 'os';
import { ConfigSchema, type Config } from './schema.js';
import {
  DEFAULT_CONFIG,
  CONFIG_FILE_NAMES,
  GLOBAL_CONFIG_DIR,
  CONFIG_FILE_NAME,
  ENV_VARS,
} from './defaults.js';

// Re-export schema types
export * from './schema.js';
export * from './defaults.js';

/**
 * Configuration loader using cosmiconfig
 */
const explorer = cosmiconfig('relaywright', {
  searchPlaces: CONFIG_FILE_NAMES,
  loaders: {
    '.yaml': (_filepath: string, content: string) => parseYaml(content),
    '.yml': (_filepath: string, content: string) => parseYaml(content),
    noExt: (_filepath: string, content: string) => parseYaml(content),
  },
});

export interface LoadConfigOptions {
  /** Defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Directory holding the global config; defaults to the user's home */
  homeDir?: string;
  /** Receives validation warnings; defaults to console.warn */
  onWarning?: (message: string) => void;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load global configuration from ~/.relaywright/config.yaml
 */
async function loadGlobalConfig(homeDir: string): Promise<Record<string, unknown>> {
  const globalConfigPath = path.join(homeDir, GLOBAL_CONFIG_DIR, CONFIG_FILE_NAME);

  let content: string;
  try {
    content = await fs.readFile(globalConfigPath, 'utf-8');
  } catch {
    // Global config doesn't exist, return empty
    return {};
  }
  const parsed: unknown = parseYaml(content);
  return isRecord(parsed) ? parsed : {};
}

/**
 * Load project-specific configuration
 */
async function loadProjectConfig(cwd?: string): Promise<Record<string, unknown>> {
  const result = await explorer.search(cwd);
  if (result && !result.isEmpty) {
    const config: unknown = result.config;
    return isRecord(config) ? config : {};
  }
  return {};
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  const policyPath = env[ENV_VARS.POLICY_PATH];
  if (policyPath) {
    config.policy = { path: policyPath };
  }

  const stateDir = env[ENV_VARS.STATE_DIR];
  if (stateDir) {
    config.state_dir = stateDir;
  }

  // Max attempts
  const maxAttempts = env[ENV_VARS.MAX_ATTEMPTS];
  if (maxAttempts) {
    const parsed = parseInt(maxAttempts, 10);
    if (!isNaN(parsed) && parsed >= 1 && parsed <= 10) {
      config.retry = { max_attempts: parsed };
    }
  }

  // Alignment threshold
  const threshold = env[ENV_VARS.ALIGNMENT_THRESHOLD];
  if (threshold) {
    const parsed = parseFloat(threshold);
    if (!isNaN(parsed) && parsed >= 0 && parsed <= 1) {
      config.alignment = { threshold: parsed };
    }
  }

  const logLevel = env[ENV_VARS.LOG_LEVEL];
  if (logLevel === 'debug' || logLevel === 'info' || logLevel === 'warn' || logLevel === 'error') {
    config.output = { log_level: logLevel };
  }

  return config;
}

/**
 * Deep merge configuration objects
 */
export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Load and merge configuration from all sources
 * Priority: env vars > project config > global config > defaults
 * An invalid result falls back to the defaults with a warning.
 */
export async function loadConfig(cwd?: string, options: LoadConfigOptions = {}): Promise<Config> {
  const warn = options.onWarning ?? ((message: string) => console.warn(message));

  // Load from all sources
  const globalConfig = await loadGlobalConfig(options.homeDir ?? homedir());
  let projectConfig: Record<string, unknown> = {};
  try {
    projectConfig = await loadProjectConfig(cwd);
  } catch (error) {
    warn(`Ignoring unreadable project config: ${error instanceof Error ? error.message : String(error)}`);
  }
  const envConfig = loadEnvConfig(options.env);

  // Merge in priority order
  let merged = deepMerge({ ...DEFAULT_CONFIG }, globalConfig);
  merged = deepMerge(merged, projectConfig);
  merged = deepMerge(merged, envConfig);

  // Validate final config
  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const problems = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    warn(`Configuration validation warnings: ${problems}; using defaults`);
    // Return defaults if validation fails
    return DEFAULT_CONFIG;
  }

  return result.data;
}

/**
 * Get a specific config value by path
 */
export function getConfigValue(config: Config, keyPath: string): unknown {
  let current: unknown = config;

  for (const key of keyPath.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }

  return current;
}

/**
 * Search for the project config file (or null if using defaults)
 */
export async function findConfigPath(cwd?: string): Promise<string | null> {
  const result = await explorer.search(cwd);
  return result?.filepath ?? null;
}

/**
 * Absolute state directory and policy path for a working directory
 */
export function resolvePaths(config: Config, cwd: string = process.cwd()): { stateDir: string; policyPath: string } {
  return {
    stateDir: path.resolve(cwd, config.state_dir),
    policyPath: path.resolve(cwd, config.policy.path),
  };
}
