import type { WorkerEndpoint } from '@scatter/shared';
import { endpointKey } from '@scatter/shared';
import type { WorkerRegistry } from './registry.js';
import type { WorkerClient, WorkerCallFailure } from './client.js';
import { createLogger } from '../logger.js';

const log = createLogger('health');

/**
 * Result of one probe round
 */
export interface ProbeReport {
  /** Endpoints that answered, in snapshot order */
  alive: WorkerEndpoint[];

  /** Endpoints removed from the registry */
  removed: Array<{ endpoint: WorkerEndpoint; failure: WorkerCallFailure }>;
}

/**
 * Health prober
 *
 * Checks every registered worker once, right before a batch is split, and
 * drops the ones that fail. There is no background loop: a worker that
 * dies between batches stays registered until the next batch probes it.
 */
export class HealthProber {
  constructor(
    private registry: WorkerRegistry,
    private client: WorkerClient
  ) {}

  /**
   * Probe all registered workers in parallel and prune the dead ones
   */
  async probe(): Promise<ProbeReport> {
    const endpoints = await this.registry.snapshot();

    const results = await Promise.all(
      endpoints.map(async (endpoint) => ({
        endpoint,
        result: await this.client.checkStatus(endpoint),
      }))
    );

    const report: ProbeReport = { alive: [], removed: [] };

    for (const { endpoint, result } of results) {
      if (result.ok) {
        report.alive.push(endpoint);
        continue;
      }

      await this.registry.remove(endpoint);
      report.removed.push({ endpoint, failure: result.failure });
      log.warn(`Worker ${endpointKey(endpoint)} is unresponsive, removing from registry`, {
        reason: result.failure.reason,
        message: result.failure.message,
      });
    }

    log.debug(`Probe complete: ${report.alive.length} alive, ${report.removed.length} removed`);
    return report;
  }
}
