import express, { type NextFunction, type Request, type Response } from 'express';
import cors, { type CorsOptions } from 'cors';
import type { ConfigurationCache } from '../services/ConfigurationCache';
import { type ElevationQueryService, SERVER_ERROR_MESSAGE } from '../services/ElevationQueryService';
import type { ErrorResponse } from '../types/Elevation';
import { ConfigurationError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface ServerOptions {
  queryService: ElevationQueryService;
  configCache: ConfigurationCache;
  /** Expose unexpected faults in responses instead of a generic message */
  debug?: boolean;
}

export const HELP_MESSAGE =
  "No dataset name provided. Try a url like '/v1/test-dataset?locations=-10,120' to get started.";

/**
 * First value of a query parameter; repeated parameters keep the first
 */
function firstQueryValue(value: unknown): string | undefined {
  if (Array.isArray(value)) {
    return firstQueryValue(value[0]);
  }
  return typeof value === 'string' ? value : undefined;
}

/**
 * Whether express tagged the error with a 4xx status (bad URI encoding, bad body)
 */
function isClientFault(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  const status = 'status' in error ? error.status : 'statusCode' in error ? error.statusCode : undefined;
  return typeof status === 'number' && status >= 400 && status < 500;
}

export function createServer({ queryService, configCache, debug = false }: ServerOptions) {
  const app = express();

  app.set('json spaces', 2);
  app.set('query parser', 'simple');
  app.disable('x-powered-by');

  // CORS origin comes from config, so it is read per request through the cache
  app.use(
    cors((_req, callback: (err: Error | null, options?: CorsOptions) => void) => {
      configCache
        .getConfig()
        .then((config) => callback(null, { origin: config.corsOrigin || false, preflightContinue: true }))
        .catch((error: unknown) => callback(error instanceof Error ? error : new Error(String(error))));
    }),
  );

  // Health check
  app.get('/', (_req: Request, res: Response) => {
    res.status(200).json({ ok: true });
  });

  // Usage help when the dataset segment is missing
  app.route('/v1/').all((req: Request, res: Response, next: NextFunction) => {
    if (!['GET', 'HEAD', 'OPTIONS'].includes(req.method)) {
      next();
      return;
    }
    const body: ErrorResponse = { status: 'INVALID_REQUEST', error: HELP_MESSAGE };
    res.status(404).json(body);
  });

  // Elevation query
  const getElevation = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const outcome = await queryService.query({
        datasetName: req.params.datasetName,
        locations: firstQueryValue(req.query.locations),
        interpolation: firstQueryValue(req.query.interpolation),
      });
      res.status(outcome.status).json(outcome.body);
    } catch (error) {
      next(error);
    }
  };

  app.route('/v1/:datasetName').get(getElevation).options(getElevation);

  app.use((_req: Request, res: Response) => {
    const body: ErrorResponse = { status: 'INVALID_REQUEST', error: 'Not found.' };
    res.status(404).json(body);
  });

  // Last-resort handler for faults outside the query service (e.g. config errors in CORS, undecodable paths)
  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    if (isClientFault(error)) {
      logger.warn({ error, path: req.path }, 'Rejected malformed request');
      const message = error instanceof Error ? error.message : 'Invalid request.';
      const body: ErrorResponse = { status: 'INVALID_REQUEST', error: message };
      res.status(400).json(body);
      return;
    }
    logger.error({ error }, 'Unhandled error');
    const message = error instanceof ConfigurationError || (debug && error instanceof Error)
      ? error.message
      : SERVER_ERROR_MESSAGE;
    const body: ErrorResponse = { status: 'SERVER_ERROR', error: message };
    res.status(500).json(body);
  });

  return app;
}
