// Task types
export type { TaskType, OutputRule, TaskTypeSpec } from './task-type.js';
export {
  TASK_TYPES,
  TASK_TYPE_NAMES,
  DEFAULT_TASK_TYPE,
  isTaskType,
} from './task-type.js';

// Worker types
export type {
  WorkerEndpoint,
  WorkerRegisterResponse,
  WorkerListResponse,
} from './worker.js';
export { endpointKey, endpointUrl, compareEndpoints } from './worker.js';

// Batch types
export type {
  FileBlob,
  TaskBatch,
  TaskSlice,
  DispatchResult,
  BatchSubmitResponse,
} from './batch.js';

// Configuration types
export type {
  LogLevel,
  APIConfiguration,
  WorkerCallConfiguration,
  StorageConfiguration,
  CoordinatorConfiguration,
  CLIConfiguration,
} from './config.js';

export {
  DEFAULT_COORDINATOR_CONFIG,
  DEFAULT_CLI_CONFIG,
} from './config.js';
