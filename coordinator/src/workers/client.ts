import type { FileBlob, TaskTypeSpec, WorkerCallConfiguration, WorkerEndpoint } from '@scatter/shared';
import { endpointUrl } from '@scatter/shared';

/**
 * Why a call to a worker produced nothing usable
 */
export interface WorkerCallFailure {
  reason: 'timeout' | 'transport' | 'status' | 'malformed-response';
  message: string;
  /** HTTP status, for `status` failures */
  status?: number;
}

export type WorkerCallResult<T> =
  | { ok: true; value: T }
  | { ok: false; failure: WorkerCallFailure };

/**
 * Outbound side of the worker contract
 */
export interface WorkerClient {
  /** Liveness probe; any 2xx answer is success */
  checkStatus(endpoint: WorkerEndpoint): Promise<WorkerCallResult<void>>;

  /**
   * Send one slice. On success the value holds the raw `results` entries,
   * which are validated item by item downstream.
   */
  sendTask(
    endpoint: WorkerEndpoint,
    taskType: TaskTypeSpec,
    files: readonly FileBlob[]
  ): Promise<WorkerCallResult<unknown[]>>;
}

export type HttpWorkerClientConfig = Pick<
  WorkerCallConfiguration,
  'statusPath' | 'taskPath' | 'probeTimeoutMs' | 'dispatchTimeoutMs'
>;

/**
 * Worker client over HTTP using the global fetch
 */
export class HttpWorkerClient implements WorkerClient {
  constructor(private config: HttpWorkerClientConfig) {}

  async checkStatus(endpoint: WorkerEndpoint): Promise<WorkerCallResult<void>> {
    const url = `${endpointUrl(endpoint)}${this.config.statusPath}`;

    return this.withTimeout<void>(this.config.probeTimeoutMs, async (signal) => {
      const response = await fetch(url, { method: 'GET', signal });
      // Drain the body so the socket is released
      await response.arrayBuffer();

      if (!response.ok) {
        return statusFailure(response.status);
      }
      return { ok: true, value: undefined };
    });
  }

  async sendTask(
    endpoint: WorkerEndpoint,
    taskType: TaskTypeSpec,
    files: readonly FileBlob[]
  ): Promise<WorkerCallResult<unknown[]>> {
    const url = `${endpointUrl(endpoint)}${this.config.taskPath}`;

    const form = new FormData();
    form.append('task_type', taskType.name);
    for (const file of files) {
      form.append(
        taskType.fieldName,
        new Blob([new Uint8Array(file.content)], { type: file.mimetype }),
        file.filename
      );
    }

    return this.withTimeout<unknown[]>(this.config.dispatchTimeoutMs, async (signal) => {
      const response = await fetch(url, { method: 'POST', body: form, signal });
      const text = await response.text();

      if (!response.ok) {
        return statusFailure(response.status);
      }

      return parseTaskResponse(text);
    });
  }

  /**
   * Run a request under an abort deadline, mapping thrown errors to failures
   */
  private async withTimeout<T>(
    timeoutMs: number,
    fn: (signal: AbortSignal) => Promise<WorkerCallResult<T>>
  ): Promise<WorkerCallResult<T>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      return await fn(controller.signal);
    } catch (error) {
      if (controller.signal.aborted) {
        return {
          ok: false,
          failure: { reason: 'timeout', message: `No response within ${timeoutMs}ms` },
        };
      }
      return {
        ok: false,
        failure: {
          reason: 'transport',
          message: error instanceof Error ? error.message : String(error),
        },
      };
    } finally {
      clearTimeout(timeout);
    }
  }
}

function statusFailure(status: number): { ok: false; failure: WorkerCallFailure } {
  return {
    ok: false,
    failure: { reason: 'status', message: `Worker returned status ${status}`, status },
  };
}

/**
 * Parse a dispatch response body. A body without `results` counts as an
 * empty result list.
 */
export function parseTaskResponse(text: string): WorkerCallResult<unknown[]> {
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    return {
      ok: false,
      failure: { reason: 'malformed-response', message: 'Response body is not JSON' },
    };
  }

  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    return {
      ok: false,
      failure: { reason: 'malformed-response', message: 'Response body is not an object' },
    };
  }

  const results: unknown = 'results' in body ? body.results : [];
  if (!Array.isArray(results)) {
    return {
      ok: false,
      failure: { reason: 'malformed-response', message: '`results` is not an array' },
    };
  }

  return { ok: true, value: results };
}
