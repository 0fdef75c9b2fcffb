/**
 * Elevations Serving Layer
 *
 * @example
 * ```typescript
 * import { createConfig, createElevationsAPI } from 'elevations-api';
 *
 * const api = createElevationsAPI(
 *   createConfig({
 *     store: { databasePath: '/data/elevations.db' },
 *     population: { endpoint: 'http://populator.internal/populate' },
 *   })
 * );
 *
 * await api.start();
 * ```
 */

export { ElevationsAPI, createElevationsAPI } from './api.js';
export { HealthMonitor, type PendingCacheProbe, type RequestOutcome } from './health.js';
export { REQUEST_ERROR_CODES } from './types.js';
export type {
  APIResponse,
  ResponseMeta,
  ErrorCode,
  HealthMetrics,
  RequestMetrics,
  PopulationMetrics,
  ErrorMetrics,
  ErrorSample,
} from './types.js';
