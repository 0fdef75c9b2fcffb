/**
 * Elevations API
 *
 * Resolves elevations for H3 cells addressed by id, coordinate or polygon,
 * and asks a populator to backfill cells the store does not know yet.
 */

// Core
export * from './core/types.js';
export * from './core/errors.js';
export * from './core/constants.js';
export {
  DEFAULT_CONFIG,
  createConfig,
  loadConfigFromEnv,
  type DeepPartial,
  type ElevationsConfig,
  type LimitsConfig,
  type PopulationConfig,
  type StoreConfig,
  type ResponseConfig,
  type APIConfig,
} from './core/config.js';
export { logger, createLogger, Logger, type LogLevel, type LogMetadata } from './core/utils/logger.js';
export { withTimeout } from './core/utils/timeout.js';

// Cells
export * as cellCodec from './cells/cell-codec.js';

// Resolution pipeline
export { LimitEnforcer } from './resolution/limit-enforcer.js';
export { InputResolver } from './resolution/input-resolver.js';
export { PopulationDedupCache, type Clock, type PopulationCacheConfig } from './resolution/population-cache.js';
export { ResolutionEngine, type ResolutionEngineOptions } from './resolution/engine.js';
export {
  assembleResponse,
  coordinateKey,
  estimateWaitSeconds,
  type AssemblerOptions,
} from './resolution/response-assembler.js';

// Adapters
export { SqliteElevationStore, type SqliteElevationStoreOptions } from './adapters/sqlite-elevation-store.js';
export {
  HttpPopulationRequester,
  LoggingPopulationRequester,
  PopulationRequestError,
  type HttpPopulationRequesterConfig,
} from './adapters/http-population-requester.js';

// Serving
export * from './serving/index.js';
