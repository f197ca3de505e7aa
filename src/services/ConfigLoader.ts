/**
 * ConfigLoader - Read the JSON config file and enumerate dataset directories
 *
 * Produces a frozen ConfigSnapshot. Every failure surfaces as a
 * ConfigurationError so the query service can map it to a server error.
 */

import { existsSync } from 'node:fs';
import { readFile, readdir } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { ConfigSnapshot, DatasetHandle } from '../types/Elevation';
import { ConfigurationError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger({ component: 'ConfigLoader' });

export const DEFAULT_CONFIG_PATH = 'config.json';
export const EXAMPLE_CONFIG_PATH = 'example-config.json';
export const DEFAULT_MAX_LOCATIONS = 100;

export const RASTER_EXTENSIONS: ReadonlySet<string> = new Set([
  '.tif', '.tiff', '.vrt', '.hgt', '.img', '.jp2', '.asc', '.bil', '.dem', '.nc',
]);

// =============================================================================
// Schema
// =============================================================================

const datasetSchema = z.object({
  name: z
    .string()
    .min(1, 'Dataset name cannot be empty')
    .refine((name) => !name.includes('/'), 'Dataset name cannot contain "/"'),
  path: z.string().min(1, 'Dataset path cannot be empty'),
});

export const configFileSchema = z
  .object({
    max_locations_per_request: z.number().int().positive().default(DEFAULT_MAX_LOCATIONS),
    access_control_allow_origin: z
      .string()
      .nullish()
      .transform((origin) => origin ?? ''),
    datasets: z.array(datasetSchema).default([]),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    for (const [i, dataset] of config.datasets.entries()) {
      if (seen.has(dataset.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['datasets', i, 'name'],
          message: `Duplicate dataset name '${dataset.name}'`,
        });
      }
      seen.add(dataset.name);
    }
  });

export type ConfigFile = z.infer<typeof configFileSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Pick the config file: an explicit path wins, then config.json, then the example config
 */
export function resolveConfigPath(explicitPath?: string, cwd: string = process.cwd()): string {
  if (explicitPath) {
    return path.resolve(cwd, explicitPath);
  }
  const local = path.resolve(cwd, DEFAULT_CONFIG_PATH);
  return existsSync(local) ? local : path.resolve(cwd, EXAMPLE_CONFIG_PATH);
}

/**
 * Parse and validate raw config file contents
 */
export function parseConfigFile(contents: string, source: string): ConfigFile {
  let json: unknown;
  try {
    json = JSON.parse(contents);
  } catch (error) {
    throw new ConfigurationError(`Config file '${source}' is not valid JSON.`, { cause: error });
  }

  const parsed = configFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid config file '${source}': ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * List raster files under a dataset directory, relative to it and sorted
 */
export async function listRasterFiles(directory: string): Promise<string[]> {
  const entries = await readdir(directory, { recursive: true });
  return entries
    .filter((entry) => RASTER_EXTENSIONS.has(path.extname(entry).toLowerCase()))
    .map((entry) => entry.split(path.sep).join('/'))
    .sort();
}

async function loadDataset(name: string, datasetPath: string, baseDir: string): Promise<DatasetHandle> {
  const directory = path.resolve(baseDir, datasetPath);

  let files: string[];
  try {
    files = await listRasterFiles(directory);
  } catch (error) {
    throw new ConfigurationError(`Dataset '${name}' path '${datasetPath}' could not be read.`, { cause: error });
  }

  if (files.length === 0) {
    throw new ConfigurationError(`Dataset '${name}' has no raster files in '${datasetPath}'.`);
  }

  return Object.freeze({ name, path: directory, files: Object.freeze(files) });
}

/**
 * Load the config file and every dataset it declares
 *
 * Dataset paths are resolved against the directory holding the config file.
 */
export async function loadConfigSnapshot(configPath: string): Promise<ConfigSnapshot> {
  let contents: string;
  try {
    contents = await readFile(configPath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Config file '${configPath}' could not be read.`, { cause: error });
  }

  const config = parseConfigFile(contents, configPath);
  const baseDir = path.dirname(configPath);

  const handles = await Promise.all(
    config.datasets.map((dataset) => loadDataset(dataset.name, dataset.path, baseDir)),
  );

  const datasets = new Map<string, DatasetHandle>();
  for (const handle of handles) {
    datasets.set(handle.name, handle);
  }

  logger.info(
    { configPath, datasets: handles.map((h) => ({ name: h.name, files: h.files.length })) },
    'Configuration loaded',
  );

  return Object.freeze({
    maxLocationsPerRequest: config.max_locations_per_request,
    corsOrigin: config.access_control_allow_origin,
    datasets,
  });
}
