/**
 * Batch coordinator
 *
 * Drives one submitted batch through probe, partition, dispatch and
 * aggregation, emitting a state event at each step.
 */

import { EventEmitter } from 'events';
import { join } from 'path';
import type { DispatchResult, TaskBatch } from '@scatter/shared';
import { TASK_TYPES } from '@scatter/shared';
import type { WorkerRegistry } from '../workers/registry.js';
import type { HealthProber } from '../workers/health.js';
import type { Dispatcher } from '../dispatch/dispatcher.js';
import { partitionFiles } from '../dispatch/partitioner.js';
import { ResultAggregator, type AggregationStats } from '../results/aggregator.js';
import { createLogger } from '../logger.js';

const log = createLogger('batch');

/**
 * Lifecycle of a batch. `rejected` and `aggregated` are terminal.
 */
export type BatchState =
  | 'received'
  | 'rejected'
  | 'probed'
  | 'partitioned'
  | 'dispatching'
  | 'aggregated';

export interface BatchStateEvent {
  batchId: string;
  state: BatchState;
  timestamp: string;
  detail?: Record<string, unknown>;
}

/**
 * Why a batch was turned away before dispatch
 */
export type BatchRejection =
  | { kind: 'validation'; message: string }
  | { kind: 'unavailable'; message: string }
  | { kind: 'storage'; message: string };

export type BatchOutcome =
  | { ok: true; result: DispatchResult; stats: AggregationStats }
  | { ok: false; rejection: BatchRejection };

export interface BatchCoordinatorConfig {
  /** Root of the per-task-type output directories */
  resultsDir: string;
}

/**
 * Batch coordinator
 *
 * Events:
 * - 'state': Emitted on every state transition (BatchStateEvent)
 */
export class BatchCoordinator extends EventEmitter {
  constructor(
    private registry: WorkerRegistry,
    private prober: HealthProber,
    private dispatcher: Dispatcher,
    private config: BatchCoordinatorConfig
  ) {
    super();
  }

  /**
   * Process one batch end to end
   */
  async submit(batch: TaskBatch): Promise<BatchOutcome> {
    const taskType = TASK_TYPES[batch.taskType];
    this.transition(batch.id, 'received', {
      taskType: batch.taskType,
      files: batch.files.length,
    });

    if (batch.files.length === 0) {
      return this.reject(batch.id, {
        kind: 'validation',
        message: `No files provided for ${batch.taskType} processing`,
      });
    }

    if ((await this.registry.size()) === 0) {
      return this.reject(batch.id, { kind: 'unavailable', message: 'No workers available' });
    }

    const report = await this.prober.probe();
    const endpoints = await this.registry.snapshot();
    this.transition(batch.id, 'probed', {
      alive: endpoints.length,
      removed: report.removed.length,
    });

    if (endpoints.length === 0) {
      return this.reject(batch.id, { kind: 'unavailable', message: 'No workers available' });
    }

    const slices = partitionFiles(batch.files, endpoints);
    this.transition(batch.id, 'partitioned', {
      slices: slices.map((s) => s.files.length),
    });

    const outputDir = join(this.config.resultsDir, batch.taskType);
    const aggregator = new ResultAggregator(taskType, outputDir);
    try {
      await aggregator.prepare();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      log.error(`Batch ${batch.id}: cannot create output directory ${outputDir}`, { reason });
      return this.reject(batch.id, {
        kind: 'storage',
        message: `Cannot create output directory for ${batch.taskType} results`,
      });
    }

    this.transition(batch.id, 'dispatching');
    const result = await aggregator.consume(this.dispatcher.dispatch(taskType, slices));
    const stats = aggregator.getStats();

    this.transition(batch.id, 'aggregated', {
      totalPersisted: result.totalPersisted,
      ...stats,
    });

    return { ok: true, result, stats };
  }

  private reject(batchId: string, rejection: BatchRejection): BatchOutcome {
    this.transition(batchId, 'rejected', { ...rejection });
    return { ok: false, rejection };
  }

  private transition(
    batchId: string,
    state: BatchState,
    detail?: Record<string, unknown>
  ): void {
    const event: BatchStateEvent = {
      batchId,
      state,
      timestamp: new Date().toISOString(),
      detail,
    };
    log.debug(`Batch ${batchId} -> ${state}`, detail);
    this.emit('state', event);
  }
}
