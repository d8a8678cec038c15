/**
 * Batch Coordinator Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import type { FileBlob, TaskBatch, TaskTypeSpec, WorkerEndpoint } from '@scatter/shared';
import { endpointKey } from '@scatter/shared';
import { BatchCoordinator, type BatchState, type BatchStateEvent } from '../coordinator.js';
import { WorkerRegistry } from '../../workers/registry.js';
import { HealthProber } from '../../workers/health.js';
import type { WorkerCallResult, WorkerClient } from '../../workers/client.js';
import { Dispatcher } from '../../dispatch/dispatcher.js';

/**
 * In-process worker pool: echoes every file back as its result, except
 * for workers listed as dead (probe fails) or broken (dispatch fails).
 */
class FakeWorkerPool implements WorkerClient {
  dead = new Set<string>();
  broken = new Set<string>();
  probes: string[] = [];
  dispatched: Array<{ worker: string; files: string[] }> = [];

  async checkStatus(endpoint: WorkerEndpoint): Promise<WorkerCallResult<void>> {
    const worker = endpointKey(endpoint);
    this.probes.push(worker);
    if (this.dead.has(worker)) {
      return { ok: false, failure: { reason: 'transport', message: 'connect ECONNREFUSED' } };
    }
    return { ok: true, value: undefined };
  }

  async sendTask(
    endpoint: WorkerEndpoint,
    taskType: TaskTypeSpec,
    files: readonly FileBlob[]
  ): Promise<WorkerCallResult<unknown[]>> {
    const worker = endpointKey(endpoint);
    this.dispatched.push({ worker, files: files.map((f) => f.filename) });
    if (this.broken.has(worker)) {
      return {
        ok: false,
        failure: { reason: 'status', message: 'Worker returned status 500', status: 500 },
      };
    }
    return {
      ok: true,
      value: files.map((f) => ({
        filename: f.filename,
        [taskType.dataKey]: Buffer.from(f.content).toString('base64'),
      })),
    };
  }
}

function imageBatch(count: number): TaskBatch {
  return {
    id: 'batch-1',
    taskType: 'image',
    files: Array.from({ length: count }, (_, i) => ({
      filename: `img-${i}.png`,
      content: new Uint8Array([i, i + 1, i + 2]),
      mimetype: 'image/png',
    })),
  };
}

describe('BatchCoordinator', () => {
  let resultsDir: string;
  let registry: WorkerRegistry;
  let pool: FakeWorkerPool;
  let coordinator: BatchCoordinator;
  let states: BatchState[];

  beforeEach(async () => {
    resultsDir = await mkdtemp(join(tmpdir(), 'scatter-batch-'));
    registry = new WorkerRegistry();
    pool = new FakeWorkerPool();
    coordinator = new BatchCoordinator(
      registry,
      new HealthProber(registry, pool),
      new Dispatcher(pool),
      { resultsDir }
    );
    states = [];
    coordinator.on('state', (event: BatchStateEvent) => states.push(event.state));
  });

  afterEach(async () => {
    await rm(resultsDir, { recursive: true, force: true });
  });

  it('should split 7 files over three workers as 3, 2, 2', async () => {
    await registry.register({ host: 'C', port: 3000 });
    await registry.register({ host: 'A', port: 3000 });
    await registry.register({ host: 'B', port: 3000 });

    const outcome = await coordinator.submit(imageBatch(7));

    expect(outcome.ok).toBe(true);
    expect(
      pool.dispatched
        .map((d) => [d.worker, d.files.length])
        .sort((a, b) => String(a[0]).localeCompare(String(b[0])))
    ).toEqual([
      ['A:3000', 3],
      ['B:3000', 2],
      ['C:3000', 2],
    ]);
    expect(pool.dispatched.find((d) => d.worker === 'A:3000')?.files).toEqual([
      'img-0.png',
      'img-1.png',
      'img-2.png',
    ]);
  });

  it('should walk through every state and persist all files', async () => {
    await registry.register({ host: 'worker-a', port: 3000 });
    await registry.register({ host: 'worker-b', port: 3000 });

    const outcome = await coordinator.submit(imageBatch(4));

    expect(states).toEqual(['received', 'probed', 'partitioned', 'dispatching', 'aggregated']);
    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.result.totalPersisted).toBe(4);
      expect(outcome.result.outputPaths).toContain(join(resultsDir, 'image', 'processed_img-0.png'));
    }
    expect(Array.from(await readFile(join(resultsDir, 'image', 'processed_img-3.png')))).toEqual([
      3, 4, 5,
    ]);
  });

  it('should reject an empty registry without probing or dispatching', async () => {
    const outcome = await coordinator.submit(imageBatch(3));

    expect(outcome).toEqual({
      ok: false,
      rejection: { kind: 'unavailable', message: 'No workers available' },
    });
    expect(states).toEqual(['received', 'rejected']);
    expect(pool.probes).toEqual([]);
    expect(pool.dispatched).toEqual([]);
  });

  it('should reject when every worker fails its probe', async () => {
    await registry.register({ host: 'worker-a', port: 3000 });
    pool.dead.add('worker-a:3000');

    const outcome = await coordinator.submit(imageBatch(3));

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.rejection.kind).toBe('unavailable');
    }
    expect(states).toEqual(['received', 'probed', 'rejected']);
    expect(pool.dispatched).toEqual([]);
    expect(await registry.size()).toBe(0);
  });

  it('should reject the batch when its output directory cannot be created', async () => {
    await registry.register({ host: 'A', port: 3000 });
    const blocker = join(resultsDir, 'blocker');
    await writeFile(blocker, 'not a directory');
    const blocked = new BatchCoordinator(
      registry,
      new HealthProber(registry, pool),
      new Dispatcher(pool),
      { resultsDir: blocker }
    );
    const blockedStates: BatchState[] = [];
    blocked.on('state', (event: BatchStateEvent) => blockedStates.push(event.state));

    const outcome = await blocked.submit(imageBatch(2));

    expect(outcome).toEqual({
      ok: false,
      rejection: { kind: 'storage', message: 'Cannot create output directory for image results' },
    });
    expect(blockedStates).toEqual(['received', 'probed', 'partitioned', 'rejected']);
    expect(pool.dispatched).toEqual([]);
  });

  it('should reject a batch with no files', async () => {
    await registry.register({ host: 'worker-a', port: 3000 });

    const outcome = await coordinator.submit({ id: 'empty', taskType: 'text', files: [] });

    expect(outcome).toEqual({
      ok: false,
      rejection: { kind: 'validation', message: 'No files provided for text processing' },
    });
    expect(pool.probes).toEqual([]);
  });

  it('should only partition over workers that passed the probe', async () => {
    await registry.register({ host: 'worker-a', port: 3000 });
    await registry.register({ host: 'worker-b', port: 3000 });
    pool.dead.add('worker-a:3000');

    await coordinator.submit(imageBatch(5));

    expect(pool.dispatched).toEqual([
      {
        worker: 'worker-b:3000',
        files: ['img-0.png', 'img-1.png', 'img-2.png', 'img-3.png', 'img-4.png'],
      },
    ]);
  });

  it('should report only the surviving slice when another fails', async () => {
    await registry.register({ host: 'worker-a', port: 3000 });
    await registry.register({ host: 'worker-b', port: 3000 });
    pool.broken.add('worker-a:3000');

    const outcome = await coordinator.submit(imageBatch(5));

    // worker-a took 3 files, worker-b took 2
    expect(outcome.ok).toBe(true);
    if (outcome.ok) {
      expect(outcome.result.totalPersisted).toBe(2);
      expect(outcome.stats).toEqual({
        slicesSucceeded: 1,
        slicesFailed: 1,
        itemsPersisted: 2,
        itemsFailed: 0,
      });
    }
    expect(states[states.length - 1]).toBe('aggregated');
    // A failed slice is not retried and its files go nowhere else
    expect(pool.dispatched).toHaveLength(2);
    expect(await registry.has({ host: 'worker-a', port: 3000 })).toBe(true);
  });
});
