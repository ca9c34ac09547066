/**
 * Default configuration values
 */

import type { Config } from './schema.js';

/**
 * Default configuration object
 */
export const DEFAULT_CONFIG: Config = {
  state_dir: '.relaywright',
  policy: {
    path: 'PROJECT.md',
  },
  alignment: {
    threshold: 0.8,
  },
  retry: {
    max_attempts: 3,
    base_delay_ms: 1000,
    max_delay_ms: 60000,
  },
  stages: {},
  detector: {
    modes: {
      full: ['persistence-commit', 'external-publish', 'ticket-close'],
      local: ['persistence-commit'],
    },
  },
  output: {
    log_level: 'info',
    format: 'text',
  },
};

/**
 * Configuration file names to search for
 */
export const CONFIG_FILE_NAMES = [
  'relaywright.config.yaml',
  'relaywright.config.yml',
  '.relaywrightrc.yaml',
  '.relaywrightrc.yml',
  '.relaywrightrc',
  '.relaywright/config.yaml',
  '.relaywright/config.yml',
];

/**
 * Global config directory path
 */
export const GLOBAL_CONFIG_DIR = '.relaywright';

/**
 * Config file name in the global config directory
 */
export const CONFIG_FILE_NAME = 'config.yaml';

/**
 * Environment variable names
 */
export const ENV_VARS = {
  POLICY_PATH: 'RELAYWRIGHT_POLICY_PATH',
  STATE_DIR: 'RELAYWRIGHT_STATE_DIR',
  MAX_ATTEMPTS: 'RELAYWRIGHT_MAX_ATTEMPTS',
  ALIGNMENT_THRESHOLD: 'RELAYWRIGHT_ALIGNMENT_THRESHOLD',
  LOG_LEVEL: 'RELAYWRIGHT_LOG_LEVEL',
} as const;
