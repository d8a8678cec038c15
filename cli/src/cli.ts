/**
 * CLI command setup using Commander.js
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';

import { configCommand } from './commands/config.js';
import { submitCommand } from './commands/submit.js';
import { workersCommand } from './commands/workers.js';
import { registerCommand, deregisterCommand } from './commands/register.js';

// Get package.json version
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJson: unknown = JSON.parse(
  readFileSync(join(__dirname, '..', 'package.json'), 'utf-8')
);
const version: unknown =
  typeof packageJson === 'object' && packageJson !== null
    ? Reflect.get(packageJson, 'version')
    : undefined;

export interface GlobalOptions {
  json?: boolean;
  config?: string;
  quiet?: boolean;
}

export function createCLI(): Command {
  const program = new Command();

  program
    .name('scatter')
    .description('Submit file batches to the scatter coordinator and manage its workers')
    .version(typeof version === 'string' ? version : '0.0.0');

  // Global options
  program
    .option('--json', 'Output as JSON instead of formatted tables')
    .option('--config <path>', 'Path to config file (default: ~/.scatter/config.json)')
    .option('-q, --quiet', 'Suppress non-essential output');

  // Register commands
  program.addCommand(configCommand());
  program.addCommand(submitCommand());
  program.addCommand(workersCommand());
  program.addCommand(registerCommand());
  program.addCommand(deregisterCommand());

  return program;
}

/**
 * Get global options from the root command
 * Traverses up the command chain to find the root program
 */
export function getGlobalOptions(command: Command): GlobalOptions {
  // Find root command by traversing parents
  let root = command;
  while (root.parent) {
    root = root.parent;
  }

  const opts = root.opts();
  return {
    json: opts.json === true,
    config: typeof opts.config === 'string' ? opts.config : undefined,
    quiet: opts.quiet === true,
  };
}
