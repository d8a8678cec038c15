import type { TaskSlice, TaskTypeSpec } from '@scatter/shared';
import { endpointKey } from '@scatter/shared';
import type { WorkerClient, WorkerCallFailure } from '../workers/client.js';
import { createLogger } from '../logger.js';

const log = createLogger('dispatch');

/**
 * A slice whose worker call produced no results
 */
export type SliceFailure = WorkerCallFailure;

/**
 * What came back for one slice
 */
export type SliceOutcome =
  | { ok: true; slice: TaskSlice; items: unknown[]; durationMs: number }
  | { ok: false; slice: TaskSlice; failure: SliceFailure; durationMs: number };

export interface DispatcherConfig {
  /** Upper bound on worker calls in flight (default: 16) */
  maxConcurrent?: number;
}

/**
 * Dispatcher
 *
 * Sends each slice to its worker through a bounded pool and yields the
 * outcomes as the calls finish, not in submission order. A failed slice is
 * reported once and dropped: no retry, and its files are not handed to
 * another worker.
 */
export class Dispatcher {
  private config: Required<DispatcherConfig>;

  constructor(
    private client: WorkerClient,
    config: DispatcherConfig = {}
  ) {
    this.config = {
      maxConcurrent: Math.max(1, config.maxConcurrent ?? 16),
    };
  }

  /**
   * Dispatch all slices, yielding each outcome as soon as it settles
   */
  async *dispatch(
    taskType: TaskTypeSpec,
    slices: readonly TaskSlice[]
  ): AsyncGenerator<SliceOutcome, void, undefined> {
    const queue = [...slices];
    const inFlight = new Map<number, Promise<{ id: number; outcome: SliceOutcome }>>();
    let nextId = 0;

    const fill = (): void => {
      while (inFlight.size < this.config.maxConcurrent) {
        const slice = queue.shift();
        if (!slice) {
          return;
        }
        const id = nextId++;
        inFlight.set(
          id,
          this.send(taskType, slice).then((outcome) => ({ id, outcome }))
        );
      }
    };

    fill();

    while (inFlight.size > 0) {
      const { id, outcome } = await Promise.race(inFlight.values());
      inFlight.delete(id);
      fill();
      yield outcome;
    }
  }

  /**
   * Run one worker call. Never rejects.
   */
  private async send(taskType: TaskTypeSpec, slice: TaskSlice): Promise<SliceOutcome> {
    const worker = endpointKey(slice.endpoint);
    const startTime = Date.now();

    log.info(`Sending ${slice.files.length} ${taskType.name} files to worker ${worker}`);

    let outcome: SliceOutcome;
    try {
      const result = await this.client.sendTask(slice.endpoint, taskType, slice.files);
      outcome = result.ok
        ? { ok: true, slice, items: result.value, durationMs: Date.now() - startTime }
        : { ok: false, slice, failure: result.failure, durationMs: Date.now() - startTime };
    } catch (error) {
      outcome = {
        ok: false,
        slice,
        failure: {
          reason: 'transport',
          message: error instanceof Error ? error.message : String(error),
        },
        durationMs: Date.now() - startTime,
      };
    }

    if (outcome.ok) {
      log.info(`Worker ${worker} returned ${outcome.items.length} results`, {
        durationMs: outcome.durationMs,
      });
    } else {
      log.warn(`Task failed for worker ${worker}, dropping ${slice.files.length} files`, {
        reason: outcome.failure.reason,
        message: outcome.failure.message,
      });
    }

    return outcome;
  }
}
