// Environment overrides for the elevation client
import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';

// Highest priority first: variables already set are never overwritten
const envFiles = ['.env.local', '.env'];

/**
 * Load .env files from the working directory. Exported shell variables win
 * over .env.local, which wins over .env.
 */
export function loadEnvFiles(cwd: string = process.cwd()): void {
  envFiles.forEach(envFile => {
    const envPath = path.resolve(cwd, envFile);
    if (fs.existsSync(envPath)) {
      dotenv.config({ path: envPath });
    }
  });
}

function parseOptionalInt(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

export interface DemEnv {
  configPath?: string;
  httpTimeoutMs?: number;
  logLevel?: string;
}

export function readEnv(source: NodeJS.ProcessEnv = process.env): DemEnv {
  return {
    configPath: source.DEM_CONFIG_PATH || undefined,
    httpTimeoutMs: parseOptionalInt(source.DEM_HTTP_TIMEOUT_MS),
    logLevel: source.DEM_LOG_LEVEL || undefined
  };
}
