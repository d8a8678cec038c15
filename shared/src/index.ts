/**
 * @scatter/shared - Types shared by the coordinator and the CLI
 *
 * Task type table, worker endpoints, batch shapes and configuration defaults.
 */

export * from './types/index.js';
