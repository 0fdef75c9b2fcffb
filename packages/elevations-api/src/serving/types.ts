/**
 * Elevations Serving Layer - Type Definitions
 */

import type { RequestErrorKind } from '../core/errors.js';

/**
 * Standardized API response wrapper
 */
export interface APIResponse<T> {
  readonly success: boolean;
  readonly data?: T;
  readonly error?: {
    readonly code: ErrorCode;
    readonly message: string;
    readonly details?: unknown;
  };
  readonly meta: ResponseMeta;
}

export interface ResponseMeta {
  readonly requestId: string;
  readonly latencyMs: number;
  readonly version: string;
  readonly schemaUri?: string;
  readonly schemaInfo?: string;
}

export type ErrorCode =
  | 'MALFORMED_REQUEST'
  | 'RESOLUTION_OUT_OF_RANGE'
  | 'CELL_LIMIT_EXCEEDED'
  | 'INVALID_CELL_IDENTIFIER'
  | 'EMPTY_COVERAGE'
  | 'PAYLOAD_TOO_LARGE'
  | 'METHOD_NOT_ALLOWED'
  | 'NOT_FOUND'
  | 'DEPENDENCY_FAILURE'
  | 'INTERNAL_ERROR';

export const REQUEST_ERROR_CODES: Readonly<Record<RequestErrorKind, ErrorCode>> = {
  MalformedRequest: 'MALFORMED_REQUEST',
  ResolutionOutOfRange: 'RESOLUTION_OUT_OF_RANGE',
  CellLimitExceeded: 'CELL_LIMIT_EXCEEDED',
  InvalidCellIdentifier: 'INVALID_CELL_IDENTIFIER',
  EmptyCoverage: 'EMPTY_COVERAGE',
};

/**
 * Health check metrics
 */
export interface HealthMetrics {
  readonly status: 'healthy' | 'degraded' | 'unhealthy';
  readonly uptime: number;
  readonly requests: RequestMetrics;
  readonly population: PopulationMetrics;
  readonly errors: ErrorMetrics;
  readonly timestamp: number;
}

export interface RequestMetrics {
  readonly total: number;
  /** Every requested cell was available */
  readonly resolved: number;
  /** Answered with a pending section */
  readonly partial: number;
  /** Caller errors (4xx) */
  readonly rejected: number;
  /** Dependency or internal failures (5xx) */
  readonly failed: number;
  readonly latencyP50: number;
  readonly latencyP95: number;
  readonly latencyP99: number;
  readonly throughput: number;
}

export interface PopulationMetrics {
  readonly cellsRequested: number;
  readonly pendingEntries: number;
  readonly evictions: number;
}

export interface ErrorMetrics {
  readonly last5m: number;
  readonly last1h: number;
  readonly last24h: number;
  readonly recentErrors: readonly ErrorSample[];
}

export interface ErrorSample {
  readonly timestamp: number;
  readonly code: ErrorCode;
  readonly error: string;
}
