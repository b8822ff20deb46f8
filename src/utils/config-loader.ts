import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import {
  DEFAULT_DEM_SOURCES,
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_QUERY_ZOOM,
  DEFAULT_USER_AGENT,
  MAX_ZOOM
} from '../constants';
import type { DemCascadeConfig, TileSource } from '../types';
import { readEnv, type DemEnv } from './env';
import { ConfigError } from './errors';
import { normalizeTileSource } from './tile-cascade';

export const CONFIG_FILENAME = 'dem-sources.config.yaml';

type RawRecord = Record<string, unknown>;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readInteger(record: RawRecord, key: string, where: string, fallback?: number): number {
  const value = record[key];
  if (value === undefined && fallback !== undefined) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${where}.${key} must be a non-negative integer`);
  }
  return value;
}

function readZoom(record: RawRecord, key: string, where: string, fallback?: number): number {
  const zoom = readInteger(record, key, where, fallback);
  if (zoom > MAX_ZOOM) {
    throw new ConfigError(`${where}.${key} must be at most ${MAX_ZOOM}, got ${zoom}`);
  }
  return zoom;
}

function readString(record: RawRecord, key: string, where: string, fallback?: string): string {
  const value = record[key];
  if (value === undefined && fallback !== undefined) {
    return fallback;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigError(`${where}.${key} must be a non-empty string`);
  }
  return value;
}

function parseSource(raw: unknown, index: number): TileSource {
  const where = `sources[${index}]`;
  if (!isRecord(raw)) {
    throw new ConfigError(`${where} must be a mapping`);
  }

  const urlTemplate = readString(raw, 'url', where);
  for (const placeholder of ['{x}', '{y}', '{z}']) {
    if (!urlTemplate.includes(placeholder)) {
      throw new ConfigError(`${where}.url is missing the ${placeholder} placeholder`);
    }
  }

  const fixed = raw.fixed;
  if (fixed !== undefined && typeof fixed !== 'boolean' && fixed !== 0 && fixed !== 1) {
    throw new ConfigError(`${where}.fixed must be a boolean`);
  }

  return normalizeTileSource({
    title: readString(raw, 'title', where),
    urlTemplate,
    minZoom: readZoom(raw, 'minZoom', where),
    maxZoom: readZoom(raw, 'maxZoom', where),
    fixed: fixed === true || fixed === 1
  });
}

/**
 * Turn a parsed YAML document into a validated config. Missing sections
 * fall back to the built-in defaults.
 */
export function parseConfig(document: unknown, env: DemEnv = {}): DemCascadeConfig {
  const root = document === undefined || document === null ? {} : document;
  if (!isRecord(root)) {
    throw new ConfigError('Configuration root must be a mapping');
  }

  const http = root.http === undefined ? {} : root.http;
  if (!isRecord(http)) {
    throw new ConfigError('http must be a mapping');
  }

  let sources: TileSource[];
  if (root.sources === undefined) {
    sources = DEFAULT_DEM_SOURCES.map(source => ({ ...source }));
  } else if (Array.isArray(root.sources) && root.sources.length > 0) {
    sources = root.sources.map(parseSource);
  } else {
    throw new ConfigError('sources must be a non-empty list');
  }

  const timeoutMs = env.httpTimeoutMs ?? readInteger(http, 'timeoutMs', 'http', DEFAULT_HTTP_TIMEOUT_MS);
  if (timeoutMs <= 0) {
    throw new ConfigError('http.timeoutMs must be positive');
  }

  return {
    queryZoom: readZoom(root, 'queryZoom', 'config', DEFAULT_QUERY_ZOOM),
    http: {
      timeoutMs,
      userAgent: readString(http, 'userAgent', 'http', DEFAULT_USER_AGENT)
    },
    sources
  };
}

/**
 * Candidate config files, highest priority first
 */
export function getConfigSearchPaths(cwd: string = process.cwd()): string[] {
  return [
    path.join(cwd, 'configs', CONFIG_FILENAME), // Consumer config
    path.join(__dirname, '../../configs', CONFIG_FILENAME) // Package default
  ];
}

export function loadConfigFile(configPath: string, env: DemEnv = readEnv()): DemCascadeConfig {
  let content: string;
  try {
    content = fs.readFileSync(configPath, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read configuration file ${configPath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let document: unknown;
  try {
    document = yaml.load(content);
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${configPath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  return parseConfig(document, env);
}

/**
 * Load the elevation source configuration. A path given explicitly or via
 * DEM_CONFIG_PATH must exist; otherwise the first file found on the search
 * path is used, and the built-in GSI catalog when there is none.
 */
export function loadConfig(explicitPath?: string, env: DemEnv = readEnv()): DemCascadeConfig {
  const requested = explicitPath ?? env.configPath;
  if (requested) {
    return loadConfigFile(path.resolve(requested), env);
  }

  for (const candidate of getConfigSearchPaths()) {
    if (fs.existsSync(candidate)) {
      return loadConfigFile(candidate, env);
    }
  }

  return parseConfig({}, env);
}
