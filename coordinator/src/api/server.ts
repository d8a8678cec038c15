import express, { type Express } from 'express';
import cors from 'cors';
import type { Server } from 'http';
import type { APIConfiguration, TaskBatch, WorkerEndpoint } from '@scatter/shared';
import type { BatchOutcome } from '../batch/coordinator.js';
import { errorHandler, notFoundHandler } from './middleware/error.js';
import { createWorkersRouter } from './routes/workers.js';
import { createBatchesRouter } from './routes/batches.js';
import { createLogger } from '../logger.js';

const log = createLogger('api');

/**
 * Service layer interface
 *
 * What the routes need from the coordinator. The service entry point
 * builds the real one; tests can pass their own.
 */
export interface CoordinatorServiceLayer {
  // Worker operations
  registerWorker(endpoint: WorkerEndpoint): Promise<boolean>;

  deregisterWorker(endpoint: WorkerEndpoint): Promise<boolean>;

  listWorkers(): Promise<WorkerEndpoint[]>;

  // Batch operations
  submitBatch(batch: TaskBatch): Promise<BatchOutcome>;
}

/**
 * Creates and configures the Express application
 */
export function createExpressApp(
  config: APIConfiguration,
  serviceLayer: CoordinatorServiceLayer,
): Express {
  const app = express();

  // Basic middleware
  app.use(express.json());

  // CORS configuration
  const corsOptions = config.corsOrigins
    ? { origin: config.corsOrigins }
    : {};
  app.use(cors(corsOptions));

  app.get('/', (_req, res) => {
    res.type('text/plain').send('Coordinator is working');
  });

  // Health check endpoint
  app.get('/health', async (_req, res, next) => {
    try {
      const workers = await serviceLayer.listWorkers();
      res.json({
        status: 'ok',
        workers: workers.length,
        timestamp: new Date().toISOString(),
      });
    } catch (err) {
      next(err);
    }
  });

  app.use(createWorkersRouter(serviceLayer));
  app.use(createBatchesRouter(serviceLayer, config.maxUploadBytes));

  // 404 handler
  app.use(notFoundHandler);

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}

/**
 * Starts the Express server
 */
export async function startServer(
  app: Express,
  config: Pick<APIConfiguration, 'host' | 'port'>,
): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(config.port, config.host, () => {
      log.info(`API server listening on http://${config.host}:${config.port}`);
      resolve(server);
    });

    server.on('error', reject);
  });
}

/**
 * Stops a server started with startServer
 */
export async function stopServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
