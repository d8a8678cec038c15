import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import type { DispatchResult, TaskTypeSpec } from '@scatter/shared';
import { endpointKey } from '@scatter/shared';
import type { SliceOutcome } from '../dispatch/dispatcher.js';
import { decodeItem, type ItemDecodeError } from './decoder.js';
import { createLogger } from '../logger.js';

const log = createLogger('results');

export type ItemOutcome = { ok: true; path: string } | { ok: false; error: ItemDecodeError };

/**
 * Counters collected while aggregating one batch
 */
export interface AggregationStats {
  slicesSucceeded: number;
  slicesFailed: number;
  itemsPersisted: number;
  itemsFailed: number;
}

/**
 * Result aggregator
 *
 * Takes slice outcomes in whatever order they finish, decodes and writes
 * each returned item, and builds the batch result. A bad item only loses
 * itself; a failed slice only loses its own files.
 */
export class ResultAggregator {
  private outputPaths: string[] = [];
  private stats: AggregationStats = {
    slicesSucceeded: 0,
    slicesFailed: 0,
    itemsPersisted: 0,
    itemsFailed: 0,
  };

  constructor(
    private taskType: TaskTypeSpec,
    private outputDir: string
  ) {}

  /**
   * Create the output directory if it is missing
   */
  async prepare(): Promise<void> {
    await mkdir(this.outputDir, { recursive: true });
  }

  /**
   * Drain a stream of slice outcomes
   */
  async consume(outcomes: AsyncIterable<SliceOutcome>): Promise<DispatchResult> {
    for await (const outcome of outcomes) {
      await this.addSlice(outcome);
    }
    return this.result();
  }

  /**
   * Persist every item of one slice outcome
   */
  async addSlice(outcome: SliceOutcome): Promise<ItemOutcome[]> {
    if (!outcome.ok) {
      this.stats.slicesFailed++;
      return [];
    }

    this.stats.slicesSucceeded++;
    const itemOutcomes: ItemOutcome[] = [];

    for (const raw of outcome.items) {
      const itemOutcome = await this.persistItem(raw);
      if (itemOutcome.ok) {
        this.stats.itemsPersisted++;
        this.outputPaths.push(itemOutcome.path);
      } else {
        this.stats.itemsFailed++;
        log.warn(
          `Error decoding or saving result for '${itemOutcome.error.filename}' from ${endpointKey(outcome.slice.endpoint)}`,
          { reason: itemOutcome.error.reason, message: itemOutcome.error.message }
        );
      }
      itemOutcomes.push(itemOutcome);
    }

    return itemOutcomes;
  }

  private async persistItem(raw: unknown): Promise<ItemOutcome> {
    const decoded = decodeItem(raw, this.taskType);
    if (!decoded.ok) {
      return decoded;
    }

    const { item } = decoded;
    const path = join(this.outputDir, item.outputName);

    try {
      if (typeof item.data === 'string') {
        await writeFile(path, item.data, 'utf-8');
      } else {
        await writeFile(path, item.data);
      }
    } catch (error) {
      return {
        ok: false,
        error: {
          filename: item.filename,
          reason: 'write-failed',
          message: error instanceof Error ? error.message : String(error),
        },
      };
    }

    return { ok: true, path };
  }

  getStats(): AggregationStats {
    return { ...this.stats };
  }

  /**
   * Batch result from everything aggregated so far
   */
  result(): DispatchResult {
    const name = this.taskType.name;
    return {
      taskType: name,
      message: `${name.charAt(0).toUpperCase()}${name.slice(1)} processing complete`,
      totalPersisted: this.outputPaths.length,
      outputPaths: [...this.outputPaths],
    };
  }
}
