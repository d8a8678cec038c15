/**
 * Batch module
 * Per-batch state machine tying the engine together
 */

export { BatchCoordinator } from './coordinator.js';
export type {
  BatchState,
  BatchStateEvent,
  BatchRejection,
  BatchOutcome,
  BatchCoordinatorConfig,
} from './coordinator.js';
