import dotenv from 'dotenv';
import { createServer } from './api/server';
import { RasterServiceBackend } from './backends/RasterServiceBackend';
import { loadConfigSnapshot, resolveConfigPath } from './services/ConfigLoader';
import { ConfigurationCache } from './services/ConfigurationCache';
import { ElevationQueryService } from './services/ElevationQueryService';
import { logger } from './utils/logger';

// Load environment variables
dotenv.config();

const PORT = Number(process.env.PORT || 5000);
const CONFIG_PATH = resolveConfigPath(process.env.CONFIG_PATH);
const BACKEND_URL = process.env.BACKEND_URL || 'http://localhost:5100';
const BACKEND_TIMEOUT_MS = Number(process.env.BACKEND_TIMEOUT_MS || 15000);
const DEBUG = process.env.DEBUG === 'true';

logger.info({ configPath: CONFIG_PATH, backendUrl: BACKEND_URL, debug: DEBUG }, 'Starting elevation query service...');

const configCache = new ConfigurationCache(() => loadConfigSnapshot(CONFIG_PATH));
const backend = new RasterServiceBackend({ baseUrl: BACKEND_URL, timeout: BACKEND_TIMEOUT_MS });
const queryService = new ElevationQueryService({ configCache, backend, debug: DEBUG });

const app = createServer({ queryService, configCache, debug: DEBUG });

const server = app.listen(PORT, () => {
  logger.info({ port: PORT }, `Server running on http://localhost:${PORT}`);
  logger.info('API endpoints:');
  logger.info('   GET  /                    - Health check');
  logger.info('   GET  /v1/:dataset         - Elevations (?locations=lat,lon|lat,lon&interpolation=bilinear)');
});

// Warm the config cache in the background; a bad config is reported per request too
configCache.getConfig().then(
  (config) => logger.info({ datasets: [...config.datasets.keys()] }, 'Datasets ready'),
  (error: unknown) => logger.error({ error }, 'Initial configuration load failed'),
);

// Graceful shutdown
const shutdown = () => {
  logger.info('Shutting down gracefully...');
  server.close(() => {
    logger.info('Server closed');
    process.exit(0);
  });
};

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);

// Reload config on SIGHUP
process.on('SIGHUP', () => {
  configCache.invalidate();
});
