/**
 * DEM Cascade Constants
 */

import type { TileSource } from './types';

export const DEM_CASCADE_VERSION = '1.0.0';

// Zoom at which every query computes its tile address and pixel offset
export const DEFAULT_QUERY_ZOOM = 15;
export const MAX_ZOOM = 30;

export const TILE_SIZE = 256;

export const DEFAULT_HTTP_TIMEOUT_MS = 10000;

export const DEFAULT_USER_AGENT = `dem-cascade/${DEM_CASCADE_VERSION}`;

export const ELEVATION_ENCODING = {
  POW2_8: 2 ** 8,
  POW2_16: 2 ** 16,
  POW2_23: 2 ** 23,
  POW2_24: 2 ** 24,
  // Centimeters to meters
  RESOLUTION_M: 0.01,
  SEA_MARKER: [128, 0, 0]
} as const;

/**
 * GSI elevation tiles, finest first. DEM5A/B/C only exist at zoom 15,
 * DEM10B covers the whole country at zoom 14.
 */
export const DEFAULT_DEM_SOURCES: readonly TileSource[] = [
  {
    title: 'DEM5A',
    urlTemplate: 'https://cyberjapandata.gsi.go.jp/xyz/dem5a_png/{z}/{x}/{y}.png',
    minZoom: 15,
    maxZoom: 15,
    fixed: true
  },
  {
    title: 'DEM5B',
    urlTemplate: 'https://cyberjapandata.gsi.go.jp/xyz/dem5b_png/{z}/{x}/{y}.png',
    minZoom: 15,
    maxZoom: 15,
    fixed: true
  },
  {
    title: 'DEM5C',
    urlTemplate: 'https://cyberjapandata.gsi.go.jp/xyz/dem5c_png/{z}/{x}/{y}.png',
    minZoom: 15,
    maxZoom: 15,
    fixed: true
  },
  {
    title: 'DEM10B',
    urlTemplate: 'https://cyberjapandata.gsi.go.jp/xyz/dem_png/{z}/{x}/{y}.png',
    minZoom: 14,
    maxZoom: 14,
    fixed: false
  }
];

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARN', 'ERROR', 'CRITICAL'] as const;

export const DEFAULT_LOG_LEVEL = 'ERROR';
