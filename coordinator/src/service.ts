/**
 * Coordinator Service
 *
 * Wires the worker registry, prober, dispatcher and batch coordinator
 * behind the REST API.
 */

import type { Server } from 'http';
import type { CoordinatorConfiguration } from '@scatter/shared';
import { DEFAULT_COORDINATOR_CONFIG } from '@scatter/shared';
import { WorkerRegistry, HealthProber, HttpWorkerClient, type WorkerClient } from './workers/index.js';
import { Dispatcher } from './dispatch/index.js';
import { BatchCoordinator } from './batch/index.js';
import {
  createExpressApp,
  startServer,
  stopServer,
  type CoordinatorServiceLayer,
} from './api/index.js';
import { createLogger, isLogLevel, setLogLevel } from './logger.js';

const log = createLogger('service');

/**
 * Components of a running coordinator
 */
export interface CoordinatorComponents {
  registry: WorkerRegistry;
  prober: HealthProber;
  dispatcher: Dispatcher;
  batches: BatchCoordinator;
}

/**
 * Service state
 */
interface ServiceState {
  httpServer: Server;
  isRunning: boolean;
}

let state: ServiceState | null = null;

function parseIntEnv(name: string, value: string): number {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer, got '${value}'`);
  }
  return parsed;
}

/**
 * Load configuration from environment
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CoordinatorConfiguration {
  const config: CoordinatorConfiguration = structuredClone(DEFAULT_COORDINATOR_CONFIG);

  if (env.API_PORT) {
    config.api.port = parseIntEnv('API_PORT', env.API_PORT);
  }

  if (env.API_HOST) {
    config.api.host = env.API_HOST;
  }

  if (env.CORS_ORIGINS) {
    config.api.corsOrigins = env.CORS_ORIGINS.split(',').map((o) => o.trim());
  }

  if (env.MAX_UPLOAD_BYTES) {
    config.api.maxUploadBytes = parseIntEnv('MAX_UPLOAD_BYTES', env.MAX_UPLOAD_BYTES);
  }

  if (env.RESULTS_DIR) {
    config.storage.resultsDir = env.RESULTS_DIR;
  }

  if (env.PROBE_TIMEOUT_MS) {
    config.workers.probeTimeoutMs = parseIntEnv('PROBE_TIMEOUT_MS', env.PROBE_TIMEOUT_MS);
  }

  if (env.DISPATCH_TIMEOUT_MS) {
    config.workers.dispatchTimeoutMs = parseIntEnv('DISPATCH_TIMEOUT_MS', env.DISPATCH_TIMEOUT_MS);
  }

  if (env.MAX_CONCURRENT_DISPATCHES) {
    config.workers.maxConcurrentDispatches = parseIntEnv(
      'MAX_CONCURRENT_DISPATCHES',
      env.MAX_CONCURRENT_DISPATCHES
    );
  }

  if (env.LOG_LEVEL) {
    if (!isLogLevel(env.LOG_LEVEL)) {
      throw new Error(`LOG_LEVEL must be one of debug, info, warn, error, got '${env.LOG_LEVEL}'`);
    }
    config.logLevel = env.LOG_LEVEL;
  }

  return config;
}

/**
 * Build the coordinator components from configuration
 */
export function createComponents(
  config: CoordinatorConfiguration,
  client: WorkerClient = new HttpWorkerClient(config.workers)
): CoordinatorComponents {
  const registry = new WorkerRegistry();
  const prober = new HealthProber(registry, client);
  const dispatcher = new Dispatcher(client, {
    maxConcurrent: config.workers.maxConcurrentDispatches,
  });
  const batches = new BatchCoordinator(registry, prober, dispatcher, {
    resultsDir: config.storage.resultsDir,
  });

  return { registry, prober, dispatcher, batches };
}

/**
 * Create the service layer the REST API talks to
 */
export function createServiceLayer(components: CoordinatorComponents): CoordinatorServiceLayer {
  const { registry, batches } = components;

  return {
    registerWorker: (endpoint) => registry.register(endpoint),
    deregisterWorker: (endpoint) => registry.remove(endpoint),
    listWorkers: () => registry.snapshot(),

    async submitBatch(batch) {
      log.info(`Batch ${batch.id}: ${batch.files.length} ${batch.taskType} files received`);
      const outcome = await batches.submit(batch);

      if (outcome.ok) {
        log.info(
          `Batch ${batch.id}: ${outcome.result.totalPersisted}/${batch.files.length} files persisted`,
          { ...outcome.stats }
        );
      } else {
        log.warn(`Batch ${batch.id} rejected: ${outcome.rejection.message}`);
      }

      return outcome;
    },
  };
}

/**
 * Start the coordinator service
 */
export async function startService(): Promise<void> {
  if (state?.isRunning) {
    throw new Error('Service is already running');
  }

  const config = loadConfig();
  setLogLevel(config.logLevel);

  log.info('Starting Coordinator Service...');
  log.info(`  API: ${config.api.host}:${config.api.port}`);
  log.info(`  Results directory: ${config.storage.resultsDir}`);

  const components = createComponents(config);
  const app = createExpressApp(config.api, createServiceLayer(components));
  const httpServer = await startServer(app, config.api);

  state = { httpServer, isRunning: true };
  log.info('=== Coordinator Service Ready ===');

  // Handle shutdown signals
  const shutdown = (): void => {
    log.info('Shutting down...');
    stopService()
      .then(() => process.exit(0))
      .catch((error) => {
        log.error('Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
        process.exit(1);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

/**
 * Stop the coordinator service
 */
export async function stopService(): Promise<void> {
  if (!state?.isRunning) {
    return;
  }

  log.info('Stopping Coordinator Service...');
  await stopServer(state.httpServer);

  state.isRunning = false;
  state = null;

  log.info('Coordinator Service stopped');
}

