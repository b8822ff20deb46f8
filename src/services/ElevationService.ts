import { DEFAULT_DEM_SOURCES, DEFAULT_QUERY_ZOOM } from '../constants';
import type {
  CascadeEntry,
  DemCascadeConfig,
  ElevationLookup,
  ElevationSample,
  PixelOffsetMode,
  TileAddress,
  TileAttempt,
  TileSource
} from '../types';
import { Logger, logger as defaultLogger } from '../utils/logger';
import { classifyElevationPixel } from '../utils/pixel-decoder';
import { projectToTile } from '../utils/projection';
import { buildCascade, makeTileUrl } from '../utils/tile-cascade';
import { PngRasterDecoder, RasterDecoder } from './RasterDecoder';
import { AxiosTileFetcher, TileFetcher } from './TileFetcher';

export interface CascadeCollaborators {
  fetcher: TileFetcher;
  decoder: RasterDecoder;
  logger?: Logger;
}

type CascadeState =
  | { kind: 'attempting'; next: number }
  | { kind: 'decoding'; index: number; url: string; address: TileAddress; body: Buffer }
  | { kind: 'resolved'; lookup: ElevationLookup }
  | { kind: 'exhausted' };

/**
 * Walk the cascade until one tile is found.
 *
 * Attempting -> Decoding -> Resolved, or Attempting -> Exhausted once every
 * entry answered 404. The first tile that exists ends the search, even when
 * its pixel holds no data. Transport, service and decode errors propagate.
 */
export async function runCascade(
  cascade: readonly CascadeEntry[],
  addressFor: (entry: CascadeEntry) => TileAddress,
  collaborators: CascadeCollaborators
): Promise<ElevationLookup> {
  const { fetcher, decoder } = collaborators;
  const log = collaborators.logger ?? defaultLogger;
  const attempts: TileAttempt[] = [];
  let state: CascadeState = { kind: 'attempting', next: 0 };

  for (;;) {
    switch (state.kind) {
      case 'attempting': {
        if (state.next >= cascade.length) {
          state = { kind: 'exhausted' };
          break;
        }
        const entry: CascadeEntry = cascade[state.next];
        const address = addressFor(entry);
        const url = makeTileUrl(entry, address);
        const response = await fetcher.fetchTile(url);

        if (response.status === 'not-found') {
          log.debug(`Tile not found for ${entry.title} z=${entry.zoom}: ${url}`);
          attempts.push({ title: entry.title, zoom: entry.zoom, url, outcome: 'not-found' });
          state = { kind: 'attempting', next: state.next + 1 };
          break;
        }

        attempts.push({ title: entry.title, zoom: entry.zoom, url, outcome: 'found' });
        state = { kind: 'decoding', index: state.next, url, address, body: response.body };
        break;
      }

      case 'decoding': {
        const source: CascadeEntry = cascade[state.index];
        const raster = decoder.decode(state.body);
        const [r, g, b] = raster.getPixel(state.address.pixelX, state.address.pixelY);
        const value = classifyElevationPixel(r, g, b);
        log.debug(`${source.title} z=${source.zoom} pixel (${state.address.pixelX}, ${state.address.pixelY}) = rgb(${r}, ${g}, ${b})`);

        state = {
          kind: 'resolved',
          lookup: value.kind === 'elevation'
            ? { status: 'resolved', elevation: value.meters, source, url: state.url, attempts }
            : { status: 'no-data', reason: value.reason, source, url: state.url, attempts }
        };
        break;
      }

      case 'resolved':
        return state.lookup;

      case 'exhausted':
        log.info(`No tile found in ${cascade.length} cascade entries`);
        return { status: 'exhausted', attempts };
    }
  }
}

export function lookupToSample(lookup: ElevationLookup): ElevationSample {
  return lookup.status === 'resolved' ? lookup.elevation : 0;
}

/**
 * Elevation for one pre-computed tile address. The same pixel offset is
 * used for every cascade entry whatever its zoom.
 */
export async function resolveElevation(
  address: TileAddress,
  cascade: readonly CascadeEntry[],
  collaborators: CascadeCollaborators
): Promise<ElevationSample> {
  return lookupToSample(await runCascade(cascade, () => address, collaborators));
}

export interface ElevationServiceOptions {
  sources?: readonly TileSource[];
  queryZoom?: number;
  timeoutMs?: number;
  userAgent?: string;
  fetcher?: TileFetcher;
  decoder?: RasterDecoder;
  logger?: Logger;
  /**
   * 'query-zoom' reuses the zoom-15 pixel offset for coarser tiles;
   * 'entry-zoom' projects again at each entry's own zoom.
   */
  pixelOffsetMode?: PixelOffsetMode;
}

export class ElevationService {
  private readonly cascade: readonly CascadeEntry[];
  private readonly queryZoom: number;
  private readonly pixelOffsetMode: PixelOffsetMode;
  private readonly collaborators: Required<CascadeCollaborators>;

  constructor(options: ElevationServiceOptions = {}) {
    this.cascade = Object.freeze(buildCascade(options.sources ?? DEFAULT_DEM_SOURCES));
    this.queryZoom = options.queryZoom ?? DEFAULT_QUERY_ZOOM;
    this.pixelOffsetMode = options.pixelOffsetMode ?? 'query-zoom';
    this.collaborators = {
      fetcher: options.fetcher ?? new AxiosTileFetcher({ timeoutMs: options.timeoutMs, userAgent: options.userAgent }),
      decoder: options.decoder ?? new PngRasterDecoder(),
      logger: options.logger ?? defaultLogger
    };
  }

  static fromConfig(config: DemCascadeConfig, overrides: ElevationServiceOptions = {}): ElevationService {
    return new ElevationService({
      sources: config.sources,
      queryZoom: config.queryZoom,
      timeoutMs: config.http.timeoutMs,
      userAgent: config.http.userAgent,
      ...overrides
    });
  }

  getCascade(): readonly CascadeEntry[] {
    return this.cascade;
  }

  /**
   * Full lookup result, distinguishing "no data" from a true 0 m elevation
   */
  async lookup(latitude: number, longitude: number): Promise<ElevationLookup> {
    const address = projectToTile(latitude, longitude, this.queryZoom);
    this.collaborators.logger.debug(
      `Tile address z=${address.zoom} x=${address.tileX} y=${address.tileY} px=${address.pixelX} py=${address.pixelY}`
    );

    const addressFor = this.pixelOffsetMode === 'entry-zoom'
      ? (entry: CascadeEntry) => entry.zoom === address.zoom ? address : projectToTile(latitude, longitude, entry.zoom)
      : () => address;

    return runCascade(this.cascade, addressFor, this.collaborators);
  }

  /**
   * Elevation in meters; 0 when no source has data for the point
   */
  async getElevation(latitude: number, longitude: number): Promise<ElevationSample> {
    return lookupToSample(await this.lookup(latitude, longitude));
  }
}

export async function getElevation(
  latitude: number,
  longitude: number,
  options: ElevationServiceOptions = {}
): Promise<ElevationSample> {
  return new ElevationService(options).getElevation(latitude, longitude);
}

export async function lookupElevation(
  latitude: number,
  longitude: number,
  options: ElevationServiceOptions = {}
): Promise<ElevationLookup> {
  return new ElevationService(options).lookup(latitude, longitude);
}
