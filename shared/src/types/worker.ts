/**
 * Address of a worker process. Two endpoints with the same host and port
 * are the same worker.
 */
export interface WorkerEndpoint {
  host: string;
  port: number;
}

/**
 * Identity key for an endpoint
 */
export function endpointKey(endpoint: WorkerEndpoint): string {
  return `${endpoint.host}:${endpoint.port}`;
}

/**
 * Order endpoints by host, then by port
 */
export function compareEndpoints(a: WorkerEndpoint, b: WorkerEndpoint): number {
  if (a.host !== b.host) {
    return a.host < b.host ? -1 : 1;
  }
  return a.port - b.port;
}

/**
 * Base URL of a worker
 */
export function endpointUrl(endpoint: WorkerEndpoint): string {
  return `http://${endpoint.host}:${endpoint.port}`;
}

export interface WorkerRegisterResponse {
  status: 'success';
  worker: WorkerEndpoint;
  /** False when the endpoint was already known */
  registered: boolean;
}

export interface WorkerListResponse {
  workers: WorkerEndpoint[];
  count: number;
}
