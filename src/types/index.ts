/**
 * DEM Cascade Type Definitions
 */

// Catalog entry for one tiled elevation layer
export interface TileSource {
  title: string;
  urlTemplate: string; // contains {x}, {y}, {z}
  minZoom: number;
  maxZoom: number;
  fixed: boolean; // preferred high-resolution source
}

// One (source, zoom) attempt in retry order
export interface CascadeEntry {
  readonly title: string;
  readonly zoom: number;
  readonly urlTemplate: string;
  readonly fixed: boolean;
}

export interface TileAddress {
  zoom: number;
  tileX: number;
  tileY: number;
  pixelX: number; // [0, 256)
  pixelY: number; // [0, 256)
}

// Meters; 0 means no data
export type ElevationSample = number;

export type RGB = [number, number, number];

export type NoDataReason = 'sea-marker' | 'nodata-sentinel';

export type PixelValue =
  | { kind: 'elevation'; meters: number }
  | { kind: 'no-data'; reason: NoDataReason };

export interface TileAttempt {
  title: string;
  zoom: number;
  url: string;
  outcome: 'not-found' | 'found';
}

export type ElevationLookup =
  | {
      status: 'resolved';
      elevation: number;
      source: CascadeEntry;
      url: string;
      attempts: TileAttempt[];
    }
  | {
      status: 'no-data';
      reason: NoDataReason;
      source: CascadeEntry;
      url: string;
      attempts: TileAttempt[];
    }
  | {
      status: 'exhausted';
      attempts: TileAttempt[];
    };

export type PixelOffsetMode = 'query-zoom' | 'entry-zoom';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'CRITICAL';

// Configuration types
export interface DemCascadeConfig {
  queryZoom: number;
  http: {
    timeoutMs: number;
    userAgent: string;
  };
  sources: TileSource[];
}
