/**
 * REST API module for the coordinator service
 *
 * Worker registration, batch submission and health endpoints.
 */

// Server and service layer
export { createExpressApp, startServer, stopServer } from './server.js';
export type { CoordinatorServiceLayer } from './server.js';

// Middleware
export {
  errorHandler,
  notFoundHandler,
  APIError,
  ValidationError,
  UnavailableError,
  StorageError,
} from './middleware/error.js';
export type { ErrorResponse } from './middleware/error.js';
export { createUploadMiddleware, uploadFilename } from './middleware/upload.js';

// Route handlers
export { createWorkersRouter } from './routes/workers.js';
export { createBatchesRouter } from './routes/batches.js';
