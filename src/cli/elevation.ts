#!/usr/bin/env node
/**
 * DEM Cascade elevation CLI
 *
 * Prints the ground elevation (meters) at a latitude/longitude, looked up
 * through the configured cascade of elevation tile sources.
 *
 *   dem-elevation 35.681167 139.767052 --log DEBUG
 *   dem-elevation -- -33.8688 151.2093
 *   dem-elevation --list-cascade
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { DEFAULT_LOG_LEVEL, DEM_CASCADE_VERSION, LOG_LEVELS } from '../constants';
import { ElevationService, ElevationServiceOptions } from '../services/ElevationService';
import type { DemCascadeConfig, ElevationLookup, LogLevel } from '../types';
import { loadConfig as loadConfigFromDisk } from '../utils/config-loader';
import { loadEnvFiles, readEnv } from '../utils/env';
import { Logger, logger as defaultLogger, parseLogLevel } from '../utils/logger';
import { buildCascade } from '../utils/tile-cascade';

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

export interface CliDependencies {
  io?: CliIO;
  logger?: Logger;
  loadConfig?: (explicitPath?: string) => DemCascadeConfig;
  createService?: (config: DemCascadeConfig, options: ElevationServiceOptions) => ElevationService;
}

interface ElevationCliOptions {
  log: string;
  config?: string;
  timeout?: number;
  explain?: boolean;
  listCascade?: boolean;
}

function parseCoordinate(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`"${value}" is not a number.`);
  }
  return parsed;
}

function parseTimeout(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Timeout must be a positive integer of milliseconds.');
  }
  return parsed;
}

function parseLogLevelOption(value: string): LogLevel {
  try {
    return parseLogLevel(value);
  } catch (error) {
    throw new InvalidArgumentError(error instanceof Error ? error.message : String(error));
  }
}

export function formatLookup(lookup: ElevationLookup): string[] {
  const lines = lookup.attempts.map(attempt =>
    `${attempt.title} z=${attempt.zoom} ${attempt.outcome} ${attempt.url}`
  );
  switch (lookup.status) {
    case 'resolved':
      lines.push(`resolved ${lookup.elevation} m from ${lookup.source.title} z=${lookup.source.zoom}`);
      break;
    case 'no-data':
      lines.push(`no-data (${lookup.reason}) from ${lookup.source.title} z=${lookup.source.zoom}`);
      break;
    case 'exhausted':
      lines.push(`exhausted after ${lookup.attempts.length} attempts`);
      break;
  }
  return lines;
}

export function createProgram(deps: CliDependencies = {}): { program: Command; exitCode: () => number } {
  const io: CliIO = deps.io ?? {
    stdout: (line) => console.log(line),
    stderr: (line) => console.error(line)
  };
  const log = deps.logger ?? defaultLogger;
  const loadConfig = deps.loadConfig ?? ((explicitPath?: string) => loadConfigFromDisk(explicitPath));
  const createService = deps.createService ?? ElevationService.fromConfig;
  let exitCode = 0;

  const fail = (message: string, error: unknown) => {
    io.stderr(chalk.red(`❌ ${message}: ${error instanceof Error ? error.message : String(error)}`));
    exitCode = 1;
  };

  const program: Command = new Command();
  program
    .name('dem-elevation')
    .description('Look up ground elevation from tiled DEM sources')
    .version(DEM_CASCADE_VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text.trimEnd()),
      writeErr: (text) => io.stderr(text.trimEnd())
    });

  program
    .argument('[lat]', 'Latitude in degrees', parseCoordinate)
    .argument('[lng]', 'Longitude in degrees', parseCoordinate)
    .option(
      '--log <level>',
      `Logging level, one of ${LOG_LEVELS.join(', ')}`,
      parseLogLevelOption,
      readEnv().logLevel ?? DEFAULT_LOG_LEVEL
    )
    .option('-c, --config <path>', 'Path to a dem-sources YAML file')
    .option('-t, --timeout <ms>', 'Per-request timeout in milliseconds', parseTimeout)
    .option('--explain', 'Print every tile attempt and how the lookup ended')
    .option('--list-cascade', 'List the (source, zoom) attempts in the order they are tried')
    .action(async (lat: number | undefined, lng: number | undefined, options: ElevationCliOptions) => {
      // Only the DEM_LOG_LEVEL default reaches here unvalidated
      let level: LogLevel;
      try {
        level = parseLogLevel(options.log);
      } catch (error) {
        fail('Invalid log level', error);
        return;
      }
      log.setLevel(level);

      if (options.listCascade) {
        try {
          const config = loadConfig(options.config);
          buildCascade(config.sources).forEach(entry => {
            io.stdout(`${entry.title} z=${entry.zoom}${entry.fixed ? '' : ' (fallback)'}`);
          });
        } catch (error) {
          fail('Failed to build cascade', error);
        }
        return;
      }

      if (lat === undefined || lng === undefined) {
        return program.error(`error: missing required argument '${lat === undefined ? 'lat' : 'lng'}'`);
      }

      try {
        const config = loadConfig(options.config);
        const service = createService(config, {
          logger: log,
          ...(options.timeout !== undefined ? { timeoutMs: options.timeout } : {})
        });

        if (options.explain) {
          formatLookup(await service.lookup(lat, lng)).forEach(line => io.stdout(line));
        } else {
          io.stdout(String(await service.getElevation(lat, lng)));
        }
      } catch (error) {
        log.debug(error instanceof Error && error.stack ? error.stack : String(error));
        fail('Elevation lookup failed', error);
      }
    });

  return { program, exitCode: () => exitCode };
}

/**
 * Run the CLI and resolve with the process exit code
 */
export async function runElevationCli(args: string[] = process.argv, deps: CliDependencies = {}): Promise<number> {
  const { program, exitCode } = createProgram(deps);
  try {
    await program.parseAsync(args);
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return exitCode();
}

// Run if called directly
if (require.main === module) {
  loadEnvFiles();
  runElevationCli()
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      console.error(chalk.red('❌ Unexpected failure:'), error);
      process.exitCode = 1;
    });
}
