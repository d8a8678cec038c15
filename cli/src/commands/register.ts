/**
 * Register/deregister commands - Add or remove a worker by hand
 */

import { Command } from 'commander';
import type { WorkerEndpoint } from '@scatter/shared';
import { endpointKey } from '@scatter/shared';
import { loadConfig } from '../utils/config-file.js';
import { createAPIClient } from '../api/client.js';
import { output, success, error, info } from '../utils/output.js';
import { getGlobalOptions, type GlobalOptions } from '../cli.js';

/**
 * Parse host/port arguments into an endpoint, or null if the port is invalid
 */
export function parseEndpoint(host: string, port: string): WorkerEndpoint | null {
  if (!host || !/^\d+$/.test(port)) {
    return null;
  }
  const value = Number(port);
  if (value < 1 || value > 65535) {
    return null;
  }
  return { host, port: value };
}

function requireEndpoint(host: string, port: string, globalOpts: GlobalOptions): WorkerEndpoint {
  const endpoint = parseEndpoint(host, port);
  if (!endpoint) {
    error(`Invalid worker address: ${host}:${port}`, globalOpts);
    process.exit(1);
  }
  return endpoint;
}

export function registerCommand(): Command {
  const cmd = new Command('register');

  cmd
    .description('Register a worker with the coordinator')
    .argument('<host>', 'Worker host')
    .argument('<port>', 'Worker port')
    .action(async (host: string, port: string, _options, command: Command) => {
      const globalOpts = getGlobalOptions(command);

      try {
        const endpoint = requireEndpoint(host, port, globalOpts);
        const client = createAPIClient(loadConfig(globalOpts.config));
        const response = await client.registerWorker(endpoint);

        if (!response.ok || !response.data) {
          error(response.error || `HTTP ${response.status}`, globalOpts);
          process.exit(1);
        }

        if (globalOpts.json) {
          output(response.data, globalOpts);
        } else if (response.data.registered) {
          success(`Registered worker ${endpointKey(endpoint)}`, globalOpts);
        } else {
          info(`Worker ${endpointKey(endpoint)} was already registered`, globalOpts);
        }
      } catch (err) {
        error(`Error: ${err instanceof Error ? err.message : String(err)}`, {});
        process.exit(1);
      }
    });

  return cmd;
}

export function deregisterCommand(): Command {
  const cmd = new Command('deregister');

  cmd
    .description('Remove a worker from the coordinator')
    .argument('<host>', 'Worker host')
    .argument('<port>', 'Worker port')
    .action(async (host: string, port: string, _options, command: Command) => {
      const globalOpts = getGlobalOptions(command);

      try {
        const endpoint = requireEndpoint(host, port, globalOpts);
        const client = createAPIClient(loadConfig(globalOpts.config));
        const response = await client.deregisterWorker(endpoint);

        if (!response.ok || !response.data) {
          error(response.error || `HTTP ${response.status}`, globalOpts);
          process.exit(1);
        }

        if (globalOpts.json) {
          output(response.data, globalOpts);
        } else {
          success(`Removed worker ${endpointKey(endpoint)}`, globalOpts);
        }
      } catch (err) {
        error(`Error: ${err instanceof Error ? err.message : String(err)}`, {});
        process.exit(1);
      }
    });

  return cmd;
}
