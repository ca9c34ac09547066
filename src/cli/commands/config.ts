/**
 * Config command
 * Show the effective configuration
 */

import { Command } from 'commander';
import { findConfigPath, getConfigValue, type Config } from '../../config/index.js';
import { loadCliContext, wantsJson } from '../context.js';
import {
  printHeader,
  printInfo,
  printKeyValue,
  printSection,
} from '../output.js';

/**
 * Print a config section
 */
function printConfigSection(title: string, section: unknown, prefix = ''): void {
  if (typeof section !== 'object' || section === null || Array.isArray(section)) {
    printKeyValue(prefix || title, JSON.stringify(section));
    return;
  }
  if (!prefix) printSection(title);
  for (const [key, value] of Object.entries(section)) {
    const label = prefix ? `${prefix}.${key}` : key;
    if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
      printConfigSection(title, value, label);
    } else {
      printKeyValue(label, Array.isArray(value) ? value.join(', ') : String(value));
    }
  }
}

function printConfig(config: Config): void {
  printKeyValue('state_dir', config.state_dir);
  printConfigSection('Policy', config.policy);
  printConfigSection('Alignment', config.alignment);
  printConfigSection('Retry', config.retry);
  printConfigSection('Stages', config.stages);
  printConfigSection('Detector', config.detector);
  printConfigSection('Output', config.output);
}

/**
 * Create the config command
 */
export function createConfigCommand(): Command {
  return new Command('config')
    .description('Show the effective configuration')
    .argument('[key]', 'Dotted key to show, e.g. retry.max_attempts')
    .option('--json', 'Output as JSON')
    .action(async (key: string | undefined, options: { json?: boolean }) => {
      const context = await loadCliContext();
      const json = wantsJson(options.json, context);

      if (key) {
        const value = getConfigValue(context.config, key);
        console.log(json || typeof value === 'object' ? JSON.stringify(value, null, 2) : String(value));
        return;
      }

      if (json) {
        console.log(JSON.stringify(context.config, null, 2));
        return;
      }

      printHeader('Current Configuration');
      const configPath = await findConfigPath(context.cwd);
      if (configPath) {
        printInfo(`Config file: ${configPath}`);
      } else {
        printInfo('Using default configuration');
      }
      printConfig(context.config);
    });
}
