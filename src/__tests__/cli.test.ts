import { runElevationCli, CliDependencies } from '../cli/elevation';
import { ElevationService } from '../services/ElevationService';
import { PngRasterDecoder } from '../services/RasterDecoder';
import { parseConfig } from '../utils/config-loader';
import { Logger } from '../utils/logger';
import { FakeTileFetcher, FakeRoute, makeTilePng } from './test-helpers';

const FINE_URL = 'https://tiles.test/fine/15/29105/12903.png';
const ALT_URL = 'https://tiles.test/alt/15/29105/12903.png';

const TEST_CONFIG = parseConfig({
  sources: [
    { title: 'FINE', url: 'https://tiles.test/fine/{z}/{x}/{y}.png', minZoom: 15, maxZoom: 15, fixed: true },
    { title: 'ALT', url: 'https://tiles.test/alt/{z}/{x}/{y}.png', minZoom: 15, maxZoom: 15, fixed: true },
    { title: 'COARSE', url: 'https://tiles.test/coarse/{z}/{x}/{y}.png', minZoom: 13, maxZoom: 14, fixed: false }
  ]
});

async function runCli(args: string[], routes: Record<string, FakeRoute> = {}) {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const logLines: string[] = [];
  const fetcher = new FakeTileFetcher(routes);
  const logger = new Logger('ERROR', (line) => logLines.push(line));
  const configPaths: Array<string | undefined> = [];
  let serviceTimeout: number | undefined;

  const deps: CliDependencies = {
    io: { stdout: (line) => stdout.push(line), stderr: (line) => stderr.push(line) },
    logger,
    loadConfig: (explicitPath) => {
      configPaths.push(explicitPath);
      return TEST_CONFIG;
    },
    createService: (config, options) => {
      serviceTimeout = options.timeoutMs;
      return ElevationService.fromConfig(config, { ...options, fetcher, decoder: new PngRasterDecoder() });
    }
  };

  const code = await runElevationCli(['node', 'dem-elevation', ...args], deps);
  return { code, stdout, stderr, logLines, fetcher, logger, configPaths, serviceTimeout: () => serviceTimeout };
}

const ONE_METER_TILE = makeTilePng([128, 0, 0], [{ x: 232, y: 83, rgb: [0, 0, 100] }]);

describe('dem-elevation CLI', () => {
  it('prints the elevation for a coordinate', async () => {
    const result = await runCli(['35.681167', '139.767052'], { [ALT_URL]: ONE_METER_TILE });

    expect(result.code).toBe(0);
    expect(result.stdout).toEqual(['1']);
    expect(result.stderr).toEqual([]);
  });

  it('prints 0 when no source has the tile', async () => {
    const result = await runCli(['35.681167', '139.767052']);

    expect(result.code).toBe(0);
    expect(result.stdout).toEqual(['0']);
    expect(result.fetcher.requests).toHaveLength(4);
  });

  it('accepts negative coordinates after --', async () => {
    const result = await runCli(['--', '-33.8688', '151.2093']);

    expect(result.code).toBe(0);
    expect(result.fetcher.requests[0]).toBe('https://tiles.test/fine/15/30147/19663.png');
  });

  it('applies the log level option', async () => {
    const result = await runCli(['35.681167', '139.767052', '--log', 'debug'], { [FINE_URL]: ONE_METER_TILE });

    expect(result.logger.getLevel()).toBe('DEBUG');
    expect(result.logLines.some(line => line.includes('Tile address z=15 x=29105 y=12903 px=232 py=83'))).toBe(true);
  });

  it('rejects an unknown log level', async () => {
    const result = await runCli(['35.681167', '139.767052', '--log', 'loud']);

    expect(result.code).toBe(1);
    expect(result.fetcher.requests).toEqual([]);
    expect(result.stderr.join('\n')).toContain('Unknown log level "loud"');
  });

  describe('with DEM_LOG_LEVEL set', () => {
    const previous = process.env.DEM_LOG_LEVEL;

    afterEach(() => {
      if (previous === undefined) {
        delete process.env.DEM_LOG_LEVEL;
      } else {
        process.env.DEM_LOG_LEVEL = previous;
      }
    });

    it('uses the environment level as the default', async () => {
      process.env.DEM_LOG_LEVEL = 'info';
      const result = await runCli(['--list-cascade']);

      expect(result.code).toBe(0);
      expect(result.logger.getLevel()).toBe('INFO');
    });

    it('lets --log replace an invalid environment level', async () => {
      process.env.DEM_LOG_LEVEL = 'verbose';
      const result = await runCli(['--list-cascade', '--log', 'DEBUG']);

      expect(result.code).toBe(0);
      expect(result.logger.getLevel()).toBe('DEBUG');
      expect(result.stdout[0]).toBe('FINE z=15');
      expect(result.stderr).toEqual([]);
    });

    it('reports an invalid environment level without --log', async () => {
      process.env.DEM_LOG_LEVEL = 'verbose';
      const result = await runCli(['35.681167', '139.767052']);

      expect(result.code).toBe(1);
      expect(result.stdout).toEqual([]);
      expect(result.stderr).toHaveLength(1);
      expect(result.stderr[0]).toContain('Invalid log level: Unknown log level "verbose"');
      expect(result.fetcher.requests).toEqual([]);
    });
  });

  it('rejects a latitude that is not a number', async () => {
    const result = await runCli(['north', '139.767052']);

    expect(result.code).toBe(1);
    expect(result.stderr.join('\n')).toContain('"north" is not a number.');
  });

  it('requires both coordinates', async () => {
    const result = await runCli(['35.681167']);

    expect(result.code).toBe(1);
    expect(result.stderr.join('\n')).toContain("missing required argument 'lng'");
  });

  it('exits with 1 on a fatal service error', async () => {
    const result = await runCli(['35.681167', '139.767052'], { [FINE_URL]: 503, [ALT_URL]: ONE_METER_TILE });

    expect(result.code).toBe(1);
    expect(result.stdout).toEqual([]);
    expect(result.stderr).toHaveLength(1);
    expect(result.stderr[0]).toContain(`Elevation lookup failed: Tile request failed with HTTP 503: ${FINE_URL}`);
    expect(result.fetcher.requests).toEqual([FINE_URL]);
  });

  it('exits with 1 on a polar latitude', async () => {
    const result = await runCli(['90', '0']);

    expect(result.code).toBe(1);
    expect(result.stderr[0]).toContain('Latitude must be strictly between -90 and 90, got 90');
  });

  it('passes --config and --timeout through', async () => {
    const result = await runCli(['35.681167', '139.767052', '--config', 'custom.yaml', '--timeout', '1500']);

    expect(result.configPaths).toEqual(['custom.yaml']);
    expect(result.serviceTimeout()).toBe(1500);
  });

  it('explains each attempt with --explain', async () => {
    const result = await runCli(['35.681167', '139.767052', '--explain'], { [ALT_URL]: ONE_METER_TILE });

    expect(result.stdout).toEqual([
      `FINE z=15 not-found ${FINE_URL}`,
      `ALT z=15 found ${ALT_URL}`,
      'resolved 1 m from ALT z=15'
    ]);
  });

  it('explains a sea pixel', async () => {
    const result = await runCli(['35.681167', '139.767052', '--explain'], { [FINE_URL]: makeTilePng([128, 0, 0]) });

    expect(result.stdout).toEqual([
      `FINE z=15 found ${FINE_URL}`,
      'no-data (sea-marker) from FINE z=15'
    ]);
  });

  it('lists the cascade', async () => {
    const result = await runCli(['--list-cascade']);

    expect(result.code).toBe(0);
    expect(result.stdout).toEqual([
      'FINE z=15',
      'ALT z=15',
      'COARSE z=14 (fallback)',
      'COARSE z=13 (fallback)'
    ]);
    expect(result.fetcher.requests).toEqual([]);
  });

  it('prints the version', async () => {
    const result = await runCli(['--version']);

    expect(result.code).toBe(0);
    expect(result.stdout).toEqual(['1.0.0']);
  });
});
