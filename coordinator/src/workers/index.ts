/**
 * Worker pool module
 * Registry of worker endpoints, liveness probing and the outbound client
 */

export { WorkerRegistry } from './registry.js';
export { HealthProber } from './health.js';
export type { ProbeReport } from './health.js';
export { HttpWorkerClient, parseTaskResponse } from './client.js';
export type {
  WorkerClient,
  WorkerCallFailure,
  WorkerCallResult,
  HttpWorkerClientConfig,
} from './client.js';
export { Mutex } from './mutex.js';
