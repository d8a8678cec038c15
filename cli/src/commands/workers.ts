/**
 * Workers command - List registered workers
 */

import { Command } from 'commander';
import ora from 'ora';
import { endpointUrl } from '@scatter/shared';
import { loadConfig } from '../utils/config-file.js';
import { createAPIClient } from '../api/client.js';
import { output, error, info, createTable } from '../utils/output.js';
import { getGlobalOptions } from '../cli.js';

export function workersCommand(): Command {
  const cmd = new Command('workers');

  cmd
    .description('List workers registered with the coordinator')
    .action(async (_options, command: Command) => {
      const globalOpts = getGlobalOptions(command);
      const spinner = ora();

      try {
        const client = createAPIClient(loadConfig(globalOpts.config));

        if (!globalOpts.quiet && !globalOpts.json) {
          spinner.start('Fetching workers...');
        }

        const response = await client.listWorkers();
        spinner.stop();

        if (!response.ok || !response.data) {
          error(response.error || `HTTP ${response.status}`, globalOpts);
          process.exit(1);
        }

        const { workers, count } = response.data;

        if (globalOpts.json) {
          output(response.data, globalOpts);
          return;
        }

        if (count === 0) {
          info('No workers registered', globalOpts);
          return;
        }

        const table = createTable(
          ['Host', 'Port', 'URL'],
          workers.map((w) => [w.host, String(w.port), endpointUrl(w)])
        );
        console.log(table.toString());
        console.log();
        info(`${count} worker(s) registered`, globalOpts);
      } catch (err) {
        if (spinner.isSpinning) {
          spinner.fail('Failed to list workers');
        }
        error(`Error: ${err instanceof Error ? err.message : String(err)}`, {});
        process.exit(1);
      }
    });

  return cmd;
}
