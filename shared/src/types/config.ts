/**
 * Log verbosity
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * REST API configuration
 */
export interface APIConfiguration {
  /** Port to listen on */
  port: number;

  /** Host to bind to */
  host: string;

  /** CORS origins */
  corsOrigins?: string[];

  /** Largest accepted upload per file (bytes) */
  maxUploadBytes: number;
}

/**
 * Outbound worker call configuration
 */
export interface WorkerCallConfiguration {
  /** Path answered by a live worker */
  statusPath: string;

  /** Path accepting a dispatched slice */
  taskPath: string;

  /** Liveness probe timeout (ms) */
  probeTimeoutMs: number;

  /** Per-slice dispatch timeout (ms) */
  dispatchTimeoutMs: number;

  /** Upper bound on slices in flight at once */
  maxConcurrentDispatches: number;
}

/**
 * Where processed results land
 */
export interface StorageConfiguration {
  /** Root directory; each task type writes to a subdirectory */
  resultsDir: string;
}

/**
 * Full coordinator configuration
 */
export interface CoordinatorConfiguration {
  api: APIConfiguration;

  workers: WorkerCallConfiguration;

  storage: StorageConfiguration;

  /** Logging level */
  logLevel: LogLevel;
}

/**
 * Default coordinator configuration
 */
export const DEFAULT_COORDINATOR_CONFIG: CoordinatorConfiguration = {
  api: {
    port: 5000,
    host: '0.0.0.0',
    maxUploadBytes: 50 * 1024 * 1024, // 50 MB
  },
  workers: {
    statusPath: '/check_status',
    taskPath: '/get_task',
    probeTimeoutMs: 2000,
    dispatchTimeoutMs: 45000,
    maxConcurrentDispatches: 16,
  },
  storage: {
    resultsDir: 'processed_results',
  },
  logLevel: 'info',
};

/**
 * CLI configuration (persisted to file)
 */
export interface CLIConfiguration {
  /** Coordinator base URL */
  apiUrl: string;

  /** Request timeout (ms) */
  timeoutMs: number;

  /** Output format preference */
  outputFormat: 'table' | 'json';
}

/**
 * Default CLI configuration
 */
export const DEFAULT_CLI_CONFIG: CLIConfiguration = {
  apiUrl: 'http://localhost:5000',
  timeoutMs: 120000,
  outputFormat: 'table',
};
