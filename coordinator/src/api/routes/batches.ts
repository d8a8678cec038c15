import { Router } from 'express';
import { v4 as uuidv4 } from 'uuid';
import type { BatchSubmitResponse, DispatchResult, FileBlob, TaskType } from '@scatter/shared';
import type { BatchRejection } from '../../batch/coordinator.js';
import { DEFAULT_TASK_TYPE, TASK_TYPES, isTaskType } from '@scatter/shared';
import type { CoordinatorServiceLayer } from '../server.js';
import { StorageError, UnavailableError, ValidationError, type APIError } from '../middleware/error.js';
import { createUploadMiddleware, uploadFilename } from '../middleware/upload.js';
import { readField } from '../request.js';

/**
 * Resolve the submitted task type, defaulting when the field is absent
 */
function parseTaskType(body: unknown): TaskType {
  const value = readField(body, 'task_type');
  if (value === undefined || value === '') {
    return DEFAULT_TASK_TYPE;
  }
  if (typeof value !== 'string' || !isTaskType(value)) {
    throw new ValidationError(`Unknown task type: ${String(value)}`);
  }
  return value;
}

function rejectionError(rejection: BatchRejection): APIError {
  switch (rejection.kind) {
    case 'validation':
      return new ValidationError(rejection.message);
    case 'unavailable':
      return new UnavailableError(rejection.message);
    case 'storage':
      return new StorageError(rejection.message);
  }
}

function toSubmitResponse(result: DispatchResult): BatchSubmitResponse {
  return {
    task_type: result.taskType,
    message: result.message,
    total_files_processed: result.totalPersisted,
    saved_files: result.outputPaths,
  };
}

/**
 * Creates the batch submission router
 */
export function createBatchesRouter(
  service: CoordinatorServiceLayer,
  maxUploadBytes: number,
): Router {
  const router = Router();
  const upload = createUploadMiddleware(maxUploadBytes);

  /**
   * POST /assign_task
   * Submit a batch of files for processing
   *
   * Multipart fields:
   * - task_type: image | text | embedding | ocr | audio | document (default: image)
   * - one file part per file, under the task type's field name
   */
  router.post('/assign_task', upload, async (req, res, next) => {
    try {
      const taskType = parseTaskType(req.body);
      const { fieldName } = TASK_TYPES[taskType];

      const uploaded = Array.isArray(req.files) ? req.files : [];
      const files: FileBlob[] = uploaded
        .filter((file) => file.fieldname === fieldName)
        .map((file) => ({
          filename: uploadFilename(file.originalname),
          content: file.buffer,
          mimetype: file.mimetype,
        }));

      if (files.length === 0) {
        throw new ValidationError(`No files provided for ${taskType} processing`);
      }

      const outcome = await service.submitBatch({ id: uuidv4(), taskType, files });

      if (!outcome.ok) {
        throw rejectionError(outcome.rejection);
      }

      res.json(toSubmitResponse(outcome.result));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
