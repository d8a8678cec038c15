import type { WorkerEndpoint } from '@scatter/shared';
import { compareEndpoints, endpointKey } from '@scatter/shared';
import { Mutex } from './mutex.js';

/**
 * Worker registry
 *
 * In-memory set of known worker endpoints, shared by the registration
 * route, the health prober and batch dispatch. Every read and write goes
 * through one lock, and callers only ever see copies.
 */
export class WorkerRegistry {
  private workers = new Map<string, WorkerEndpoint>();
  private lock = new Mutex();

  /**
   * Add an endpoint. Returns false if it was already registered.
   */
  async register(endpoint: WorkerEndpoint): Promise<boolean> {
    const key = endpointKey(endpoint);
    return this.lock.runExclusive(() => {
      if (this.workers.has(key)) {
        return false;
      }
      this.workers.set(key, { host: endpoint.host, port: endpoint.port });
      return true;
    });
  }

  /**
   * Remove an endpoint. Returns false if it was not registered.
   */
  async remove(endpoint: WorkerEndpoint): Promise<boolean> {
    const key = endpointKey(endpoint);
    return this.lock.runExclusive(() => this.workers.delete(key));
  }

  /**
   * Point-in-time copy of all endpoints, ordered by host then port
   */
  async snapshot(): Promise<WorkerEndpoint[]> {
    return this.lock.runExclusive(() =>
      Array.from(this.workers.values(), (w) => ({ host: w.host, port: w.port })).sort(
        compareEndpoints
      )
    );
  }

  async has(endpoint: WorkerEndpoint): Promise<boolean> {
    const key = endpointKey(endpoint);
    return this.lock.runExclusive(() => this.workers.has(key));
  }

  async size(): Promise<number> {
    return this.lock.runExclusive(() => this.workers.size);
  }
}
