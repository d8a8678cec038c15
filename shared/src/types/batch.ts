import type { TaskType } from './task-type.js';
import type { WorkerEndpoint } from './worker.js';

/**
 * A file received from a client
 */
export interface FileBlob {
  readonly filename: string;
  readonly content: Uint8Array;
  readonly mimetype: string;
}

/**
 * One client submission
 */
export interface TaskBatch {
  id: string;
  taskType: TaskType;
  files: readonly FileBlob[];
}

/**
 * Files assigned to a single worker for one dispatch round
 */
export interface TaskSlice {
  endpoint: WorkerEndpoint;
  files: readonly FileBlob[];
}

/**
 * Outcome of a batch once aggregation is done
 */
export interface DispatchResult {
  taskType: TaskType;
  message: string;
  totalPersisted: number;
  outputPaths: string[];
}

/**
 * Client-facing response of a batch submission
 */
export interface BatchSubmitResponse {
  task_type: TaskType;
  message: string;
  total_files_processed: number;
  saved_files: string[];
}
