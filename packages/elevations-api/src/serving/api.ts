/**
 * Elevations HTTP API Server
 *
 * Features:
 * - POST / and POST /v1/elevations resolve cells, coordinates or polygons
 * - Lossless JSON body parsing (64-bit cell ids survive as bigint)
 * - Standardized APIResponse wrapper, 202 when part of the answer is pending
 * - CORS and security headers, request ID tracking
 * - Health and Prometheus endpoints
 */

import { createServer, type IncomingMessage, type ServerResponse } from 'http';
import { URL } from 'url';
import { randomBytes } from 'crypto';
import { isInteger, isSafeNumber, parse } from 'lossless-json';
import type { ElevationsConfig } from '../core/config.js';
import type { ElevationsEnvelope, Resolution } from '../core/types.js';
import { DependencyFailureError, toError, type Result } from '../core/errors.js';
import { logger } from '../core/utils/logger.js';
import { LimitEnforcer } from '../resolution/limit-enforcer.js';
import { InputResolver } from '../resolution/input-resolver.js';
import { PopulationDedupCache } from '../resolution/population-cache.js';
import { ResolutionEngine } from '../resolution/engine.js';
import { assembleResponse } from '../resolution/response-assembler.js';
import { SqliteElevationStore } from '../adapters/sqlite-elevation-store.js';
import {
  HttpPopulationRequester,
  LoggingPopulationRequester,
} from '../adapters/http-population-requester.js';
import { HealthMonitor } from './health.js';
import { REQUEST_ERROR_CODES, type APIResponse, type ErrorCode, type ResponseMeta } from './types.js';

/**
 * Integers beyond 2^53 become bigint; everything else stays a number
 */
function parseJsonNumber(value: string): number | bigint {
  return isInteger(value) && !isSafeNumber(value) ? BigInt(value) : parseFloat(value);
}

/**
 * Production HTTP API server
 */
export class ElevationsAPI {
  private readonly server: ReturnType<typeof createServer>;
  private readonly engine: ResolutionEngine;
  private readonly healthMonitor: HealthMonitor;
  private readonly config: ElevationsConfig;
  private readonly onStop?: () => void;

  constructor(engine: ResolutionEngine, config: ElevationsConfig, onStop?: () => void) {
    this.engine = engine;
    this.config = config;
    this.onStop = onStop;
    this.healthMonitor = new HealthMonitor(engine);

    this.server = createServer((req, res) => {
      this.handleRequest(req, res).catch((error: unknown) => {
        logger.error('Unhandled request failure', { error: toError(error).message });
      });
    });
  }

  /**
   * Start HTTP server
   */
  start(): Promise<void> {
    const { port, host, version } = this.config.api;

    return new Promise((resolve) => {
      this.server.listen(port, host, () => {
        logger.info('Elevations API server started', {
          version,
          host,
          port,
          url: `http://${host}:${port}`,
        });
        logger.info('API endpoints registered', {
          endpoints: [
            'POST / - Resolve elevations',
            `POST /${version}/elevations - Resolve elevations`,
            `GET /${version}/health - Health check`,
            `GET /${version}/metrics - Prometheus metrics`,
          ],
        });
        resolve();
      });
    });
  }

  /**
   * Stop HTTP server
   */
  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.close((error) => {
        this.onStop?.();
        if (error) {
          reject(error);
          return;
        }
        logger.info('API server stopped');
        resolve();
      });
    });
  }

  get health(): HealthMonitor {
    return this.healthMonitor;
  }

  /**
   * Handle incoming HTTP request
   */
  async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const requestId = this.generateRequestId();
    const startTime = performance.now();
    const { version } = this.config.api;

    this.setSecurityHeaders(req, res, requestId);

    // Handle OPTIONS preflight
    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
    const pathname = url.pathname;

    try {
      if (pathname === '/' || pathname === `/${version}/elevations`) {
        if (req.method !== 'POST') {
          res.setHeader('Allow', 'POST, OPTIONS');
          this.sendErrorResponse(
            res,
            405,
            'METHOD_NOT_ALLOWED',
            'This endpoint only accepts POST or OPTIONS requests.',
            requestId,
            performance.now() - startTime
          );
          return;
        }
        await this.handleElevations(req, res, requestId, startTime);
      } else if (pathname === `/${version}/health` && req.method === 'GET') {
        this.handleHealth(res, requestId, startTime);
      } else if (pathname === `/${version}/metrics` && req.method === 'GET') {
        this.handleMetrics(res);
      } else {
        this.sendErrorResponse(
          res,
          404,
          'NOT_FOUND',
          `Endpoint not found: ${pathname}`,
          requestId,
          performance.now() - startTime
        );
      }
    } catch (error) {
      const err = toError(error);
      logger.error('API request error', { requestId, error: err.message, stack: err.stack });
      this.healthMonitor.recordFailure('INTERNAL_ERROR', err.message);
      this.sendErrorResponse(
        res,
        500,
        'INTERNAL_ERROR',
        'Internal server error',
        requestId,
        performance.now() - startTime
      );
    }
  }

  /**
   * Handle POST / and POST /v1/elevations
   */
  private async handleElevations(
    req: IncomingMessage,
    res: ServerResponse,
    requestId: string,
    startTime: number
  ): Promise<void> {
    const { maxBodyBytes } = this.config.api;
    const body = await this.readBody(req, maxBodyBytes);

    if (body === null) {
      const message = `Request body exceeds ${maxBodyBytes} bytes.`;
      this.healthMonitor.recordRejection('PAYLOAD_TOO_LARGE', message);
      this.sendErrorResponse(res, 413, 'PAYLOAD_TOO_LARGE', message, requestId, performance.now() - startTime);
      return;
    }

    let payload: unknown;
    try {
      payload = parse(body, null, parseJsonNumber);
    } catch (error) {
      const message = 'Request body is not valid JSON.';
      this.healthMonitor.recordRejection('MALFORMED_REQUEST', message);
      this.sendErrorResponse(
        res,
        400,
        'MALFORMED_REQUEST',
        message,
        requestId,
        performance.now() - startTime,
        { reason: toError(error).message }
      );
      return;
    }

    let result: Result<Resolution>;
    try {
      result = await this.engine.resolve(payload);
    } catch (error) {
      if (!(error instanceof DependencyFailureError)) {
        throw error;
      }
      logger.error('Elevation lookup failed', {
        requestId,
        dependency: error.dependency,
        error: error.message,
      });
      this.healthMonitor.recordFailure('DEPENDENCY_FAILURE', error.message);
      this.sendErrorResponse(
        res,
        503,
        'DEPENDENCY_FAILURE',
        'Elevation data is temporarily unavailable - please retry later.',
        requestId,
        performance.now() - startTime,
        { dependency: error.dependency }
      );
      return;
    }

    if (!result.ok) {
      const { kind, message, details } = result.error;
      const code = REQUEST_ERROR_CODES[kind];
      this.healthMonitor.recordRejection(code, message);
      this.sendErrorResponse(res, 400, code, message, requestId, performance.now() - startTime, details);
      return;
    }

    const envelope = assembleResponse(result.value, this.config.response);
    const latencyMs = performance.now() - startTime;
    const partial = envelope.pending !== undefined;

    this.healthMonitor.recordRequest(
      latencyMs,
      partial ? 'partial' : 'resolved',
      result.value.populationRequested.size
    );

    this.sendSuccessResponse<ElevationsEnvelope>(res, partial ? 202 : 200, envelope, requestId, latencyMs);
  }

  /**
   * Handle /v1/health endpoint
   */
  private handleHealth(res: ServerResponse, requestId: string, startTime: number): void {
    const metrics = this.healthMonitor.getMetrics();
    this.sendSuccessResponse(res, 200, metrics, requestId, performance.now() - startTime);
  }

  /**
   * Handle /v1/metrics endpoint (Prometheus format)
   */
  private handleMetrics(res: ServerResponse): void {
    const prometheusMetrics = this.healthMonitor.exportPrometheus();

    res.writeHead(200, { 'Content-Type': 'text/plain; version=0.0.4' });
    res.end(prometheusMetrics);
  }

  /**
   * Collect the request body; null once it grows past maxBytes.
   *
   * An oversized body is still drained so the response can be written on the
   * same connection.
   */
  private async readBody(req: IncomingMessage, maxBytes: number): Promise<string | null> {
    const declared = Number(req.headers['content-length']);
    if (Number.isFinite(declared) && declared > maxBytes) {
      req.resume();
      return null;
    }

    const chunks: Buffer[] = [];
    let received = 0;
    let tooLarge = false;

    for await (const chunk of req) {
      const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      received += buffer.length;
      if (received > maxBytes) {
        tooLarge = true;
        continue;
      }
      chunks.push(buffer);
    }

    return tooLarge ? null : Buffer.concat(chunks).toString('utf8');
  }

  /**
   * Set CORS, security and tracking headers
   */
  private setSecurityHeaders(req: IncomingMessage, res: ServerResponse, requestId: string): void {
    const { corsOrigins, version } = this.config.api;

    // CORS headers: echo the caller's origin when it is on the allow list
    if (corsOrigins.includes('*')) {
      res.setHeader('Access-Control-Allow-Origin', '*');
    } else {
      const requested = req.headers.origin;
      const origin = requested !== undefined && corsOrigins.includes(requested) ? requested : corsOrigins[0];
      if (origin !== undefined) {
        res.setHeader('Access-Control-Allow-Origin', origin);
      }
      res.setHeader('Vary', 'Origin');
    }
    res.setHeader('Access-Control-Allow-Methods', 'POST, GET, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
    res.setHeader('Access-Control-Expose-Headers', 'X-Request-ID, X-API-Version');

    // Security headers
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'DENY');
    res.setHeader('Content-Security-Policy', "default-src 'none'; frame-ancestors 'none';");
    res.setHeader('Referrer-Policy', 'no-referrer');

    // Request tracking
    res.setHeader('X-Request-ID', requestId);
    res.setHeader('X-API-Version', version);
  }

  private buildMeta(requestId: string, latencyMs: number): ResponseMeta {
    const { schemaUri, schemaInfo } = this.config.response;
    return {
      requestId,
      latencyMs: Math.round(latencyMs * 100) / 100,
      version: this.config.api.version,
      ...(schemaUri !== undefined ? { schemaUri } : {}),
      ...(schemaInfo !== undefined ? { schemaInfo } : {}),
    };
  }

  /**
   * Send success response (standardized)
   */
  private sendSuccessResponse<T>(
    res: ServerResponse,
    status: number,
    data: T,
    requestId: string,
    latencyMs: number
  ): void {
    const response: APIResponse<T> = {
      success: true,
      data,
      meta: this.buildMeta(requestId, latencyMs),
    };

    res.setHeader('Cache-Control', 'no-store');
    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(response, bigIntReplacer, 2));
  }

  /**
   * Send error response (standardized)
   */
  private sendErrorResponse(
    res: ServerResponse,
    status: number,
    code: ErrorCode,
    message: string,
    requestId: string,
    latencyMs: number,
    details?: unknown
  ): void {
    const response: APIResponse<never> = {
      success: false,
      error: details === undefined ? { code, message } : { code, message, details },
      meta: this.buildMeta(requestId, latencyMs),
    };

    res.writeHead(status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(response, bigIntReplacer, 2));
  }

  private generateRequestId(): string {
    return `req_${randomBytes(16).toString('hex')}`;
  }
}

// Cell ids go out as decimal strings, matching the elevations keys
function bigIntReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

/**
 * Wire the SQLite store, population requester and resolution pipeline into an API server
 */
export function createElevationsAPI(config: ElevationsConfig): ElevationsAPI {
  const store = new SqliteElevationStore(config.store.databasePath);

  const requester = config.population.endpoint
    ? new HttpPopulationRequester({
        endpoint: config.population.endpoint,
        timeoutMs: config.population.timeoutMs,
      })
    : new LoggingPopulationRequester();

  const engine = new ResolutionEngine({
    resolver: new InputResolver(new LimitEnforcer(config.limits)),
    gateway: store,
    requester,
    cache: new PopulationDedupCache({
      ttlSeconds: config.population.ttlSeconds,
      maxEntries: config.population.maxEntries,
    }),
    storeTimeoutMs: config.store.timeoutMs,
    populationTimeoutMs: config.population.timeoutMs,
  });

  return new ElevationsAPI(engine, config, () => store.close());
}
