/**
 * DEM Cascade - ground elevation lookup over tiled, RGB-encoded DEM services
 *
 * Projects a coordinate onto web-Mercator tiles, walks a prioritized cascade
 * of elevation tile sources until one has the tile, and decodes the pixel.
 */

// Core exports
export {
  ElevationService,
  getElevation,
  lookupElevation,
  resolveElevation,
  runCascade,
  lookupToSample
} from './services/ElevationService';
export type { ElevationServiceOptions, CascadeCollaborators } from './services/ElevationService';
export { AxiosTileFetcher } from './services/TileFetcher';
export type { TileFetcher, TileResponse, AxiosTileFetcherOptions } from './services/TileFetcher';
export { PngRasterDecoder } from './services/RasterDecoder';
export type { Raster, RasterDecoder } from './services/RasterDecoder';

// Building blocks
export { projectToTile, validateCoordinate } from './utils/projection';
export { buildCascade, normalizeTileSource, makeTileUrl } from './utils/tile-cascade';
export { classifyElevationPixel, decodeElevationPixel } from './utils/pixel-decoder';

// Configuration, logging and errors
export { loadConfig, loadConfigFile, parseConfig, getConfigSearchPaths } from './utils/config-loader';
export { Logger, logger, parseLogLevel } from './utils/logger';
export {
  DemError,
  DomainError,
  TileServiceError,
  TileTransportError,
  TileDecodeError,
  ConfigError
} from './utils/errors';

// CLI
export { runElevationCli } from './cli/elevation';

// Types
export * from './types';

// Constants
export * from './constants';
