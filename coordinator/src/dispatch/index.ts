/**
 * Dispatch module
 * Partitioning of a batch and concurrent delivery to workers
 */

export { partitionFiles } from './partitioner.js';
export { Dispatcher } from './dispatcher.js';
export type { DispatcherConfig, SliceOutcome, SliceFailure } from './dispatcher.js';
