/**
 * Elevations API - Request Handling Tests
 *
 * ARCHITECTURE: Tests drive handleRequest with mocked request/response objects
 * (no real HTTP server, no real DB) for fast, deterministic execution.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { Readable } from 'node:stream';
import type { IncomingMessage, ServerResponse } from 'http';
import { ElevationsAPI } from '../../../serving/api.js';
import { ResolutionEngine } from '../../../resolution/engine.js';
import { InputResolver } from '../../../resolution/input-resolver.js';
import { LimitEnforcer } from '../../../resolution/limit-enforcer.js';
import { PopulationDedupCache } from '../../../resolution/population-cache.js';
import { createConfig, type DeepPartial, type ElevationsConfig } from '../../../core/config.js';
import type { CellId, ElevationStoreGateway } from '../../../core/types.js';

const A = 630949280935159295n;
const B = 630949280220393983n;
const C = 630949280220402687n;
const D = 630949280220390399n;
const X = 631053048207246335n;

const SCHEMA_URI = 'https://schemas.test/elevations-output.json';
const SCHEMA_INFO = 'https://schemas.test/elevations-output';

interface InvokeResult {
  readonly status: number;
  readonly headers: Record<string, string | string[]>;
  readonly text: string;
  readonly body: unknown;
}

/**
 * Mock HTTP request/response objects
 */
function createMockRequest(
  url: string,
  method: string,
  body?: string,
  headers: Record<string, string> = {}
): IncomingMessage {
  const stream = Readable.from(body === undefined ? [] : [Buffer.from(body)]);
  return Object.assign(stream, {
    url,
    method,
    headers: { host: 'localhost:3000', ...headers },
  }) as unknown as IncomingMessage;
}

function createMockResponse(): {
  res: ServerResponse;
  getStatus: () => number;
  getHeaders: () => Record<string, string | string[]>;
  getText: () => string;
} {
  let statusCode = 200;
  const headers: Record<string, string | string[]> = {};
  let text = '';

  const res = {
    writeHead: vi.fn((status: number, hdrs?: Record<string, string | string[]>) => {
      statusCode = status;
      if (hdrs) {
        Object.entries(hdrs).forEach(([key, value]) => {
          headers[key.toLowerCase()] = value;
        });
      }
    }),
    setHeader: vi.fn((key: string, value: string | string[]) => {
      headers[key.toLowerCase()] = value;
    }),
    end: vi.fn((data?: string) => {
      if (data) text = data;
    }),
  } as unknown as ServerResponse;

  return {
    res,
    getStatus: () => statusCode,
    getHeaders: () => headers,
    getText: () => text,
  };
}

async function invoke(
  api: ElevationsAPI,
  url: string,
  method = 'POST',
  body?: string,
  headers?: Record<string, string>
): Promise<InvokeResult> {
  const req = createMockRequest(url, method, body, headers);
  const { res, getStatus, getHeaders, getText } = createMockResponse();

  await api.handleRequest(req, res);

  const text = getText();
  const isJson = String(getHeaders()['content-type'] ?? '').startsWith('application/json');
  return {
    status: getStatus(),
    headers: getHeaders(),
    text,
    body: isJson && text ? JSON.parse(text) : null,
  };
}

function inMemoryGateway(elevations: ReadonlyMap<CellId, number>): ElevationStoreGateway {
  return {
    lookup: async (ids) => {
      const found = new Map<CellId, number>();
      for (const id of ids) {
        const elevation = elevations.get(id);
        if (elevation !== undefined) found.set(id, elevation);
      }
      return found;
    },
  };
}

describe('ElevationsAPI', () => {
  let requestPopulation: Mock<(ids: ReadonlySet<CellId>) => Promise<void>>;

  function createAPI(
    gateway: ElevationStoreGateway,
    overrides: DeepPartial<ElevationsConfig> = {}
  ): ElevationsAPI {
    const config = createConfig({
      ...overrides,
      response: { schemaUri: SCHEMA_URI, schemaInfo: SCHEMA_INFO, ...overrides.response },
    });

    const engine = new ResolutionEngine({
      resolver: new InputResolver(new LimitEnforcer(config.limits)),
      gateway,
      requester: { requestPopulation },
      cache: new PopulationDedupCache({
        ttlSeconds: config.population.ttlSeconds,
        maxEntries: config.population.maxEntries,
      }),
      storeTimeoutMs: config.store.timeoutMs,
      populationTimeoutMs: config.population.timeoutMs,
    });

    return new ElevationsAPI(engine, config);
  }

  let api: ElevationsAPI;

  beforeEach(() => {
    requestPopulation = vi.fn<(ids: ReadonlySet<CellId>) => Promise<void>>().mockResolvedValue(undefined);
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    api = createAPI(
      inMemoryGateway(
        new Map([
          [A, 32.1],
          [B, 59],
          [X, 1],
        ])
      )
    );
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('POST elevations', () => {
    it('returns 200 with elevations keyed by cell id when everything is available', async () => {
      const response = await invoke(api, '/', 'POST', '{"cells": [630949280935159295, 630949280220393983]}');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        success: true,
        data: {
          elevations: { '630949280935159295': 32.1, '630949280220393983': 59 },
        },
        meta: {
          requestId: expect.stringMatching(/^req_[0-9a-f]{32}$/),
          latencyMs: expect.any(Number),
          version: 'v1',
          schemaUri: SCHEMA_URI,
          schemaInfo: SCHEMA_INFO,
        },
      });
      expect(requestPopulation).not.toHaveBeenCalled();
    });

    it('returns 202 with a pending section and triggers population for missing cells', async () => {
      const response = await invoke(
        api,
        '/v1/elevations',
        'POST',
        JSON.stringify({ cells: [A, B, C, D].map((cell) => cell.toString()) })
      );

      expect(response.status).toBe(202);
      expect(response.body).toMatchObject({
        success: true,
        data: {
          elevations: { '630949280935159295': 32.1, '630949280220393983': 59 },
          pending: ['630949280220402687', '630949280220390399'],
          estimated_wait_time: 240,
        },
      });
      expect(requestPopulation).toHaveBeenCalledWith(new Set([C, D]));
    });

    it('echoes the literal coordinate for coordinate requests', async () => {
      const response = await invoke(api, '/', 'POST', '{"coordinates": [[54.53097, 5.96836]]}');

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        data: { elevations: { '[54.53097, 5.96836]': 1 } },
      });
    });

    it('rejects more cells than the limit', async () => {
      const cells = Array.from({ length: 16 }, (_, index) => index + 1);
      const response = await invoke(api, '/', 'POST', JSON.stringify({ cells }));

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({
        success: false,
        error: {
          code: 'CELL_LIMIT_EXCEEDED',
          message: 'Request for 16 cells rejected - only 15 cells can be sent per request.',
        },
      });
    });

    it('rejects an oversized polygon as a caller error', async () => {
      const body = JSON.stringify({
        polygon: [
          [54, 5],
          [54, 6],
          [55, 6],
          [55, 5],
        ],
        resolution: 12,
      });

      const response = await invoke(api, '/', 'POST', body);

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({
        success: false,
        error: { code: 'CELL_LIMIT_EXCEEDED', details: { limit: 1500 } },
      });
      expect(api.health.getMetrics().requests).toMatchObject({ rejected: 1, failed: 0 });
    });

    it('rejects a request containing an invalid cell', async () => {
      const response = await invoke(api, '/', 'POST', '{"cells": [1, 630949280935159295]}');

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({
        error: {
          code: 'INVALID_CELL_IDENTIFIER',
          message: '1 is not a valid H3 cell - aborting request.',
          details: { cell: '1' },
        },
      });
    });

    it.each([1, 13])('rejects resolution %i', async (resolution) => {
      const response = await invoke(
        api,
        '/',
        'POST',
        JSON.stringify({ coordinates: [[54.53097, 5.96836]], resolution })
      );

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({
        error: {
          code: 'RESOLUTION_OUT_OF_RANGE',
          message: `Request for resolution ${resolution} rejected - the resolution must be between 8 and 12 inclusively.`,
        },
      });
    });

    it('rejects a polygon that covers no cells', async () => {
      const body = JSON.stringify({
        polygon: [
          [54.53097, 5.96836],
          [54.53075, 5.96435],
          [54.52926, 5.96432],
          [54.52903, 5.96888],
        ],
        resolution: 8,
      });

      const response = await invoke(api, '/', 'POST', body);

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({
        error: { code: 'EMPTY_COVERAGE', message: 'Request for zero cells rejected.' },
      });
    });

    it('rejects a body that is not JSON', async () => {
      const response = await invoke(api, '/', 'POST', 'cells=1,2,3');

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({
        error: { code: 'MALFORMED_REQUEST', message: 'Request body is not valid JSON.' },
      });
    });

    it('rejects a payload with the wrong keys', async () => {
      const response = await invoke(api, '/', 'POST', '{"incorrect": [630949280935159295]}');

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({
        error: {
          code: 'MALFORMED_REQUEST',
          message: "Request must contain exactly one of 'cells', 'coordinates' or 'polygon'.",
        },
      });
    });

    it('rejects a body over the size limit', async () => {
      const small = createAPI(inMemoryGateway(new Map()), { api: { maxBodyBytes: 16 } });

      const response = await invoke(small, '/', 'POST', '{"cells": [630949280935159295]}');

      expect(response.status).toBe(413);
      expect(response.body).toMatchObject({
        error: { code: 'PAYLOAD_TOO_LARGE', message: 'Request body exceeds 16 bytes.' },
      });
    });

    it('rejects a declared content length over the limit without reading the body', async () => {
      const small = createAPI(inMemoryGateway(new Map()), { api: { maxBodyBytes: 16 } });

      const response = await invoke(small, '/', 'POST', '{}', { 'content-length': '4096' });

      expect(response.status).toBe(413);
    });

    it('maps store failures to 503', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const failing = createAPI({
        lookup: async () => {
          throw new Error('database is locked');
        },
      });

      const response = await invoke(failing, '/', 'POST', '{"cells": [630949280935159295]}');

      expect(response.status).toBe(503);
      expect(response.body).toMatchObject({
        success: false,
        error: {
          code: 'DEPENDENCY_FAILURE',
          message: 'Elevation data is temporarily unavailable - please retry later.',
          details: { dependency: 'elevation-store' },
        },
      });
      expect(requestPopulation).not.toHaveBeenCalled();
    });
  });

  describe('methods and routing', () => {
    it.each(['GET', 'PUT', 'DELETE'])('rejects %s on the elevations endpoint', async (method) => {
      const response = await invoke(api, '/', method);

      expect(response.status).toBe(405);
      expect(response.headers['allow']).toBe('POST, OPTIONS');
      expect(response.body).toMatchObject({
        success: false,
        error: {
          code: 'METHOD_NOT_ALLOWED',
          message: 'This endpoint only accepts POST or OPTIONS requests.',
        },
      });
    });

    it('answers CORS preflight with 204', async () => {
      const response = await invoke(api, '/', 'OPTIONS');

      expect(response.status).toBe(204);
      expect(response.headers['access-control-allow-origin']).toBe('*');
      expect(response.headers['access-control-allow-methods']).toBe('POST, GET, OPTIONS');
      expect(response.text).toBe('');
    });

    it('returns 404 for unknown paths', async () => {
      const response = await invoke(api, '/v1/unknown', 'GET');

      expect(response.status).toBe(404);
      expect(response.body).toMatchObject({
        error: { code: 'NOT_FOUND', message: 'Endpoint not found: /v1/unknown' },
      });
    });

    it('sets CORS and tracking headers on every response', async () => {
      const response = await invoke(api, '/', 'POST', '{"cells": [630949280935159295]}');

      expect(response.headers['access-control-allow-origin']).toBe('*');
      expect(response.headers['x-request-id']).toMatch(/^req_[0-9a-f]{32}$/);
      expect(response.headers['x-api-version']).toBe('v1');
      expect(response.headers['content-type']).toBe('application/json');
    });

    it('echoes an allowed origin when origins are restricted', async () => {
      const restricted = createAPI(inMemoryGateway(new Map()), {
        api: { corsOrigins: ['https://maps.test', 'https://app.test'] },
      });

      const response = await invoke(restricted, '/', 'OPTIONS', undefined, { origin: 'https://app.test' });

      expect(response.headers['access-control-allow-origin']).toBe('https://app.test');
      expect(response.headers['vary']).toBe('Origin');
    });
  });

  describe('health and metrics', () => {
    it('reports request outcomes', async () => {
      await invoke(api, '/', 'POST', '{"cells": [630949280935159295]}');
      await invoke(api, '/', 'POST', '{"cells": [630949280220402687]}');
      await invoke(api, '/', 'POST', '{"cells": [1]}');

      const response = await invoke(api, '/v1/health', 'GET');

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        success: true,
        data: {
          status: 'healthy',
          requests: { total: 3, resolved: 1, partial: 1, rejected: 1, failed: 0 },
          population: { cellsRequested: 1, pendingEntries: 1, evictions: 0 },
        },
      });
    });

    it('exports Prometheus metrics as text', async () => {
      await invoke(api, '/', 'POST', '{"cells": [630949280935159295]}');

      const response = await invoke(api, '/v1/metrics', 'GET');

      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toBe('text/plain; version=0.0.4');
      expect(response.text).toContain('elevations_requests_total{outcome="resolved"} 1\n');
      expect(response.text).toContain('elevations_health 2\n');
    });
  });
});
