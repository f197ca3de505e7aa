import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createServer, HELP_MESSAGE } from '../server';
import { ConfigurationCache } from '../../services/ConfigurationCache';
import { ElevationQueryService, SERVER_ERROR_MESSAGE } from '../../services/ElevationQueryService';
import { INTERPOLATION_METHODS, type ElevationBackend } from '../../backends/ElevationBackend';
import type { ConfigSnapshot, DatasetHandle, InterpolationMethod } from '../../types/Elevation';
import { type Result, ok } from '../../types/Result';
import { ConfigurationError, type BackendInputError } from '../../utils/errors';

const TEST_DATASET: DatasetHandle = {
  name: 'test-dataset',
  path: '/data/test-dataset',
  files: ['tile.tif'],
};

function createSnapshot(corsOrigin: string): ConfigSnapshot {
  return {
    maxLocationsPerRequest: 100,
    corsOrigin,
    datasets: new Map([[TEST_DATASET.name, TEST_DATASET]]),
  };
}

// Mock backend: returns lat * 10, or fails when told to
class MockBackend implements ElevationBackend {
  readonly interpolationMethods = INTERPOLATION_METHODS;
  failure: Error | null = null;

  async compute(
    lats: readonly number[],
    _lons: readonly number[],
    _dataset: DatasetHandle,
    _method: InterpolationMethod,
  ): Promise<Result<(number | null)[], BackendInputError>> {
    if (this.failure) {
      throw this.failure;
    }
    return ok(lats.map((lat) => lat * 10));
  }
}

describe('API Server', () => {
  let backend: MockBackend;
  let app: Express;

  const buildApp = (loader: () => Promise<ConfigSnapshot>, debug = false): Express => {
    const configCache = new ConfigurationCache(loader);
    const queryService = new ElevationQueryService({ configCache, backend, debug });
    return createServer({ queryService, configCache, debug });
  };

  beforeEach(() => {
    backend = new MockBackend();
    app = buildApp(async () => createSnapshot('*'));
  });

  describe('GET /', () => {
    it('should return healthy status', async () => {
      const response = await request(app).get('/');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ ok: true });
    });
  });

  describe('GET /v1/', () => {
    it('should return usage help with 404', async () => {
      const response = await request(app).get('/v1/');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ status: 'INVALID_REQUEST', error: HELP_MESSAGE });
    });

    it('should answer without the trailing slash', async () => {
      const response = await request(app).get('/v1');

      expect(response.status).toBe(404);
      expect(response.body.error).toBe(HELP_MESSAGE);
    });

    it('should answer HEAD with 404', async () => {
      const response = await request(app).head('/v1/');

      expect(response.status).toBe(404);
    });
  });

  describe('GET /v1/:dataset', () => {
    it('should return elevations for delimited locations', async () => {
      const response = await request(app)
        .get('/v1/test-dataset')
        .query({ locations: '-10,120', interpolation: 'bilinear' });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        status: 'OK',
        results: [{ elevation: -100, location: { lat: -10, lng: 120 } }],
      });
    });

    it('should return elevations for a prefixed polyline', async () => {
      const response = await request(app)
        .get('/v1/test-dataset')
        .query({ locations: 'enc:_p~iF~ps|U_ulLnnqC_mqNvxq`@' });

      expect(response.status).toBe(200);
      expect(response.body.results.map((r: { location: { lat: number } }) => r.location.lat)).toEqual([
        38.5, 40.7, 43.252,
      ]);
    });

    it('should keep the first of repeated parameters', async () => {
      const response = await request(app).get('/v1/test-dataset?locations=1,2&locations=3,4');

      expect(response.status).toBe(200);
      expect(response.body.results).toEqual([{ elevation: 10, location: { lat: 1, lng: 2 } }]);
    });

    it('should reject empty locations with 400', async () => {
      const response = await request(app).get('/v1/test-dataset?locations=');

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        status: 'INVALID_REQUEST',
        error: 'No locations provided. Add locations in a query string: ?locations=lat1,lon1|lat2,lon2.',
      });
    });

    it('should reject missing locations with 400', async () => {
      const response = await request(app).get('/v1/test-dataset');

      expect(response.status).toBe(400);
      expect(response.body.status).toBe('INVALID_REQUEST');
    });

    it('should reject an unknown dataset', async () => {
      const response = await request(app).get('/v1/srtm90m').query({ locations: '1,2' });

      expect(response.status).toBe(400);
      expect(response.body.error).toBe("Dataset 'srtm90m' not in config.");
    });

    it('should report the position of a bad segment', async () => {
      const response = await request(app).get('/v1/test-dataset').query({ locations: '1,2|95,0' });

      expect(response.status).toBe(400);
      expect(response.body.error).toBe(
        "Unable to parse location '95,0' in position 2. Latitude must be between -90 and 90. Provide locations in lat,lon order.",
      );
    });

    it('should answer HEAD with the CORS header', async () => {
      const response = await request(app).head('/v1/test-dataset').query({ locations: '1,2' });

      expect(response.status).toBe(200);
      expect(response.headers['access-control-allow-origin']).toBe('*');
    });

    it('should answer OPTIONS like GET', async () => {
      const response = await request(app).options('/v1/test-dataset').query({ locations: '1,2' });

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('OK');
    });

    it('should mask unexpected faults', async () => {
      backend.failure = new Error('raster read failed');

      const response = await request(app).get('/v1/test-dataset').query({ locations: '1,2' });

      expect(response.status).toBe(500);
      expect(response.body).toEqual({ status: 'SERVER_ERROR', error: SERVER_ERROR_MESSAGE });
    });

    it('should expose unexpected faults in debug mode', async () => {
      app = buildApp(async () => createSnapshot('*'), true);
      backend.failure = new Error('raster read failed');

      const response = await request(app).get('/v1/test-dataset').query({ locations: '1,2' });

      expect(response.status).toBe(500);
      expect(response.body).toEqual({ status: 'SERVER_ERROR', error: 'raster read failed' });
    });
  });

  describe('CORS', () => {
    it('should add the configured origin to successful responses', async () => {
      const response = await request(app).get('/v1/test-dataset').query({ locations: '1,2' });

      expect(response.headers['access-control-allow-origin']).toBe('*');
    });

    it('should add the configured origin to error responses', async () => {
      const response = await request(app).get('/v1/test-dataset').query({ locations: '' });

      expect(response.status).toBe(400);
      expect(response.headers['access-control-allow-origin']).toBe('*');
    });

    it('should use a specific configured origin', async () => {
      app = buildApp(async () => createSnapshot('https://maps.example.com'));

      const response = await request(app).get('/');

      expect(response.headers['access-control-allow-origin']).toBe('https://maps.example.com');
    });

    it('should omit the header when no origin is configured', async () => {
      app = buildApp(async () => createSnapshot(''));

      const response = await request(app).get('/');

      expect(response.headers['access-control-allow-origin']).toBeUndefined();
    });
  });

  describe('configuration errors', () => {
    it('should return SERVER_ERROR when the config cannot load', async () => {
      app = buildApp(async () => {
        throw new ConfigurationError("Config file 'config.json' could not be read.");
      });

      const response = await request(app).get('/v1/test-dataset').query({ locations: '1,2' });

      expect(response.status).toBe(500);
      expect(response.body).toEqual({
        status: 'SERVER_ERROR',
        error: "Config file 'config.json' could not be read.",
      });
    });
  });

  describe('malformed paths', () => {
    it('should reject an undecodable dataset segment with 400', async () => {
      const response = await request(app).get('/v1/%E0%A4%A?locations=1,2');

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        status: 'INVALID_REQUEST',
        error: "Failed to decode param '%E0%A4%A'",
      });
      expect(response.headers['access-control-allow-origin']).toBe('*');
    });
  });

  describe('unknown routes', () => {
    it('should return 404 in the error envelope', async () => {
      const response = await request(app).get('/v2/test-dataset');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ status: 'INVALID_REQUEST', error: 'Not found.' });
    });
  });
});
