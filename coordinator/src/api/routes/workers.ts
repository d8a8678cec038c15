import { Router } from 'express';
import type {
  WorkerEndpoint,
  WorkerListResponse,
  WorkerRegisterResponse,
} from '@scatter/shared';
import { endpointKey } from '@scatter/shared';
import type { CoordinatorServiceLayer } from '../server.js';
import { APIError, ValidationError } from '../middleware/error.js';
import { parsePort, readField } from '../request.js';
import { createLogger } from '../../logger.js';

const log = createLogger('api');

/**
 * Validates a worker registration body
 *
 * Accepts `host`/`port`, or the older `slave_ip`/`slave_port`.
 */
function parseRegisterRequest(body: unknown): WorkerEndpoint {
  const host = readField(body, 'host') ?? readField(body, 'slave_ip');
  const port = readField(body, 'port') ?? readField(body, 'slave_port');

  if (host === undefined || host === null || host === '' || port === undefined || port === null || port === '') {
    throw new ValidationError('host and port are required');
  }
  if (typeof host !== 'string' || host.trim().length === 0) {
    throw new ValidationError('host must be a non-empty string');
  }

  const parsedPort = parsePort(port);
  if (parsedPort === null) {
    throw new ValidationError(`Invalid port: ${String(port)}. Must be an integer between 1 and 65535`);
  }

  return { host: host.trim(), port: parsedPort };
}

/**
 * Creates the workers router
 */
export function createWorkersRouter(service: CoordinatorServiceLayer): Router {
  const router = Router();

  /**
   * POST /register
   * Register a worker endpoint (idempotent)
   */
  router.post('/register', async (req, res, next) => {
    try {
      const endpoint = parseRegisterRequest(req.body);
      const registered = await service.registerWorker(endpoint);

      if (registered) {
        log.info(`Worker registered: ${endpointKey(endpoint)}`);
      } else {
        log.debug(`Worker already registered: ${endpointKey(endpoint)}`);
      }

      const response: WorkerRegisterResponse = {
        status: 'success',
        worker: endpoint,
        registered,
      };
      res.json(response);
    } catch (err) {
      next(err);
    }
  });

  /**
   * GET /workers
   * List registered workers (not probed)
   */
  router.get('/workers', async (_req, res, next) => {
    try {
      const workers = await service.listWorkers();
      const response: WorkerListResponse = { workers, count: workers.length };
      res.json(response);
    } catch (err) {
      next(err);
    }
  });

  /**
   * DELETE /workers/:host/:port
   * Remove a worker from the registry
   */
  router.delete('/workers/:host/:port', async (req, res, next) => {
    try {
      const { host } = req.params;
      const port = parsePort(req.params.port);

      if (!host || port === null) {
        throw new ValidationError('A valid host and port are required');
      }

      const endpoint: WorkerEndpoint = { host, port };
      const removed = await service.deregisterWorker(endpoint);
      if (!removed) {
        throw new APIError(404, `Worker ${endpointKey(endpoint)} is not registered`);
      }

      log.info(`Worker deregistered: ${endpointKey(endpoint)}`);
      res.json({ status: 'success', worker: endpoint });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
