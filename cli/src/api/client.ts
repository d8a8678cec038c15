/**
 * Coordinator REST API Client
 *
 * HTTP client for the scatter coordinator's registration and batch endpoints.
 */

import type {
  BatchSubmitResponse,
  CLIConfiguration,
  TaskType,
  WorkerEndpoint,
  WorkerListResponse,
  WorkerRegisterResponse,
} from '@scatter/shared';
import { TASK_TYPES } from '@scatter/shared';

export interface APIClientOptions {
  baseUrl: string;
  timeout?: number;
}

export interface APIResponse<T = unknown> {
  ok: boolean;
  status: number;
  data?: T;
  error?: string;
}

/**
 * A file read from disk, ready to upload
 */
export interface UploadFile {
  filename: string;
  content: Uint8Array;
}

type RequestBody = { json: unknown } | { form: FormData };

/**
 * Create API client from CLI configuration
 */
export function createAPIClient(config: CLIConfiguration): ScatterAPIClient {
  return new ScatterAPIClient({
    baseUrl: config.apiUrl,
    timeout: config.timeoutMs,
  });
}

function errorMessageOf(body: unknown): string | undefined {
  if (typeof body !== 'object' || body === null) {
    return undefined;
  }
  const message: unknown = Reflect.get(body, 'message');
  if (typeof message === 'string') return message;
  const error: unknown = Reflect.get(body, 'error');
  if (typeof error === 'string') return error;
  return undefined;
}

/**
 * Coordinator REST API Client
 */
export class ScatterAPIClient {
  private baseUrl: string;
  private timeout: number;

  constructor(options: APIClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, ''); // Remove trailing slash
    this.timeout = options.timeout || 30000;
  }

  /**
   * Make an HTTP request to the coordinator
   */
  private async request<T>(
    method: string,
    path: string,
    body?: RequestBody
  ): Promise<APIResponse<T>> {
    const url = `${this.baseUrl}${path}`;
    const headers: Record<string, string> = {};
    let payload: string | FormData | undefined;

    if (body && 'json' in body) {
      headers['Content-Type'] = 'application/json';
      payload = JSON.stringify(body.json);
    } else if (body) {
      // fetch sets the multipart boundary itself
      payload = body.form;
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(url, {
        method,
        headers,
        body: payload,
        signal: controller.signal,
      });

      const contentType = response.headers.get('content-type');
      let data: unknown;

      if (contentType?.includes('application/json')) {
        data = await response.json();
      }

      if (!response.ok) {
        return {
          ok: false,
          status: response.status,
          error: errorMessageOf(data) || response.statusText,
        };
      }

      return {
        ok: true,
        status: response.status,
        data: data as T,
      };
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') {
        return {
          ok: false,
          status: 0,
          error: `Request timeout after ${this.timeout}ms`,
        };
      }

      return {
        ok: false,
        status: 0,
        error: err instanceof Error ? err.message : 'Network error',
      };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  // ============ Health ============

  async health(): Promise<APIResponse<{ status: string; workers: number; timestamp: string }>> {
    return this.request('GET', '/health');
  }

  // ============ Workers ============

  async listWorkers(): Promise<APIResponse<WorkerListResponse>> {
    return this.request('GET', '/workers');
  }

  async registerWorker(endpoint: WorkerEndpoint): Promise<APIResponse<WorkerRegisterResponse>> {
    return this.request('POST', '/register', {
      json: { host: endpoint.host, port: endpoint.port },
    });
  }

  async deregisterWorker(
    endpoint: WorkerEndpoint
  ): Promise<APIResponse<{ status: string; worker: WorkerEndpoint }>> {
    const host = encodeURIComponent(endpoint.host);
    return this.request('DELETE', `/workers/${host}/${endpoint.port}`);
  }

  // ============ Batches ============

  /**
   * Upload files as one batch. The multipart field follows the task type.
   */
  async submitBatch(
    taskType: TaskType,
    files: UploadFile[]
  ): Promise<APIResponse<BatchSubmitResponse>> {
    const form = new FormData();
    form.append('task_type', taskType);

    const { fieldName } = TASK_TYPES[taskType];
    for (const file of files) {
      const blob = new Blob([new Uint8Array(file.content)], { type: 'application/octet-stream' });
      form.append(fieldName, blob, file.filename);
    }

    return this.request('POST', '/assign_task', { form });
  }
}
