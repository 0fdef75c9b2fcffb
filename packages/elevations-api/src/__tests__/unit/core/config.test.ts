/**
 * Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, createConfig, loadConfigFromEnv } from '../../../core/config.js';

describe('createConfig', () => {
  it('returns the defaults without overrides', () => {
    const config = createConfig();

    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config.limits).toEqual({
      minResolution: 8,
      maxResolution: 12,
      cellLimit: 15,
      polygonCellLimitMultiplier: 100,
    });
    expect(config.population.ttlSeconds).toBe(240);
    expect(config.population.maxEntries).toBe(1024);
    expect(config.response.estimatedWaitSeconds).toBe(240);
  });

  it('merges nested overrides onto the defaults', () => {
    const config = createConfig({ limits: { cellLimit: 50 }, api: { port: 8080 } });

    expect(config.limits.cellLimit).toBe(50);
    expect(config.limits.maxResolution).toBe(12);
    expect(config.api.port).toBe(8080);
    expect(config.api.host).toBe('0.0.0.0');
  });

  it('rejects inverted resolution bounds', () => {
    expect(() => createConfig({ limits: { minResolution: 12, maxResolution: 8 } })).toThrow(
      'Invalid resolution bounds: minimum 12 exceeds maximum 8'
    );
  });
});

describe('loadConfigFromEnv', () => {
  it('uses defaults when nothing is set', () => {
    expect(loadConfigFromEnv({ PATH: '/usr/bin' })).toEqual(DEFAULT_CONFIG);
  });

  it('reads ELEVATIONS_* variables', () => {
    const config = loadConfigFromEnv({
      ELEVATIONS_CELL_LIMIT: '20',
      ELEVATIONS_POPULATION_TTL_SECONDS: '0.5',
      ELEVATIONS_POPULATION_ENDPOINT: 'http://populator.test/populate',
      ELEVATIONS_DATABASE_PATH: '/tmp/elevations-test.db',
      ELEVATIONS_CORS_ORIGINS: 'https://a.test, https://b.test',
      ELEVATIONS_SCHEMA_URI: 'https://schemas.test/output.json',
    });

    expect(config.limits.cellLimit).toBe(20);
    expect(config.population.ttlSeconds).toBe(0.5);
    expect(config.population.endpoint).toBe('http://populator.test/populate');
    expect(config.store.databasePath).toBe('/tmp/elevations-test.db');
    expect(config.api.corsOrigins).toEqual(['https://a.test', 'https://b.test']);
    expect(config.response.schemaUri).toBe('https://schemas.test/output.json');
  });

  it('treats empty values as unset', () => {
    const config = loadConfigFromEnv({ ELEVATIONS_PORT: '', ELEVATIONS_HOST: '' });

    expect(config.api.port).toBe(3000);
    expect(config.api.host).toBe('0.0.0.0');
  });

  it('rejects invalid values', () => {
    expect(() => loadConfigFromEnv({ ELEVATIONS_PORT: 'abc' })).toThrow(
      /^Invalid environment configuration: ELEVATIONS_PORT: /
    );
    expect(() => loadConfigFromEnv({ ELEVATIONS_POPULATION_ENDPOINT: 'not a url' })).toThrow(
      /ELEVATIONS_POPULATION_ENDPOINT/
    );
  });

  it('rejects inverted resolution bounds', () => {
    expect(() =>
      loadConfigFromEnv({ ELEVATIONS_MIN_RESOLUTION: '12', ELEVATIONS_MAX_RESOLUTION: '8' })
    ).toThrow('Invalid resolution bounds: minimum 12 exceeds maximum 8');
  });
});
