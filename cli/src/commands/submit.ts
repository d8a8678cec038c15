/**
 * Submit command - Send a batch of files to the coordinator
 */

import { Command } from 'commander';
import ora from 'ora';
import { readFile } from 'fs/promises';
import { basename } from 'path';
import { TASK_TYPE_NAMES, DEFAULT_TASK_TYPE, isTaskType } from '@scatter/shared';
import { loadConfig } from '../utils/config-file.js';
import { createAPIClient, type UploadFile } from '../api/client.js';
import {
  output,
  success,
  error,
  warning,
  formatKeyValue,
  formatList,
  formatBytes,
  colorProcessed,
} from '../utils/output.js';
import { getGlobalOptions } from '../cli.js';

/**
 * Read each path from disk. Unreadable paths are reported and skipped.
 */
export async function readUploadFiles(
  paths: string[],
  onSkip: (path: string, reason: string) => void
): Promise<UploadFile[]> {
  const files: UploadFile[] = [];
  for (const path of paths) {
    try {
      const content = await readFile(path);
      files.push({ filename: basename(path), content: new Uint8Array(content) });
    } catch (err) {
      onSkip(path, err instanceof Error ? err.message : String(err));
    }
  }
  return files;
}

export function submitCommand(): Command {
  const cmd = new Command('submit');

  cmd
    .description('Submit files for distributed processing')
    .argument('<files...>', 'Files to process')
    .option('-t, --type <taskType>', `Task type (${TASK_TYPE_NAMES.join('|')})`, DEFAULT_TASK_TYPE)
    .action(async (paths: string[], options: { type: string }, command: Command) => {
      const globalOpts = getGlobalOptions(command);
      const spinner = ora();

      try {
        const taskType = options.type;
        if (!isTaskType(taskType)) {
          error(`Invalid task type: ${taskType}`, globalOpts);
          error(`Valid values: ${TASK_TYPE_NAMES.join(', ')}`, globalOpts);
          process.exit(1);
        }

        const files = await readUploadFiles(paths, (path, reason) => {
          warning(`Skipping ${path}: ${reason}`, globalOpts);
        });

        if (files.length === 0) {
          error('No readable files to submit', globalOpts);
          process.exit(1);
        }

        const totalBytes = files.reduce((sum, f) => sum + f.content.byteLength, 0);
        const client = createAPIClient(loadConfig(globalOpts.config));

        if (!globalOpts.quiet && !globalOpts.json) {
          spinner.start(`Submitting ${files.length} files (${formatBytes(totalBytes)})...`);
        }

        const response = await client.submitBatch(taskType, files);

        if (!response.ok || !response.data) {
          if (spinner.isSpinning) {
            spinner.fail('Batch was not processed');
          }
          error(response.error || `HTTP ${response.status}`, globalOpts);
          process.exit(1);
        }

        const result = response.data;
        if (spinner.isSpinning) {
          spinner.succeed(result.message);
        }

        if (globalOpts.json) {
          output(result, globalOpts);
          return;
        }

        success('Batch complete', globalOpts);
        console.log();
        console.log(
          formatKeyValue({
            'Task Type': result.task_type,
            'Message': result.message,
            'Files Processed': colorProcessed(result.total_files_processed, files.length),
          })
        );
        if (result.saved_files.length > 0) {
          console.log();
          console.log(formatList(result.saved_files));
        }
      } catch (err) {
        if (spinner.isSpinning) {
          spinner.fail('Failed to submit batch');
        }
        error(`Error: ${err instanceof Error ? err.message : String(err)}`, {});
        process.exit(1);
      }
    });

  return cmd;
}
