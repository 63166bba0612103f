/**
 * Background Workers Exports
 */

export type { ExpirationSweepWorker } from './expiration-sweep.js';
export { createExpirationSweepWorker } from './expiration-sweep.js';
