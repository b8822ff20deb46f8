import { TILE_SIZE } from '../constants';
import type { TileAddress } from '../types';
import { DomainError } from './errors';

// World coordinate scale: a 256px world spans 2π radians
const WORLD_SCALE = 128 / Math.PI;

function toRadians(degrees: number): number {
  return degrees * Math.PI / 180;
}

function clampOffset(value: number): number {
  return Math.max(0, Math.min(TILE_SIZE - 1, value));
}

/**
 * Throws a DomainError unless the coordinate can be projected.
 * Longitude is not range-checked; it wraps through the formula.
 */
export function validateCoordinate(lat: number, lng: number): void {
  if (!Number.isFinite(lat) || !Number.isFinite(lng)) {
    throw new DomainError(`Coordinate must be finite, got lat=${lat}, lng=${lng}`);
  }
  if (lat <= -90 || lat >= 90) {
    throw new DomainError(`Latitude must be strictly between -90 and 90, got ${lat}`);
  }
}

/**
 * Spherical web-Mercator projection of a WGS84 point onto 256px XYZ tiles.
 * Returns the tile containing the point and the pixel within that tile.
 */
export function projectToTile(lat: number, lng: number, zoom: number): TileAddress {
  validateCoordinate(lat, lng);

  const scale = Math.pow(2, zoom);

  const worldX = WORLD_SCALE * (toRadians(lng) + Math.PI);
  const pixelCoordX = worldX * scale;
  const tileX = Math.floor(pixelCoordX / TILE_SIZE);

  const sinLat = Math.sin(toRadians(lat));
  const worldY = -WORLD_SCALE / 2 * Math.log((1 + sinLat) / (1 - sinLat)) + TILE_SIZE / 2;
  if (!Number.isFinite(worldY)) {
    // sin() rounds to ±1 within a few ulps of the poles
    throw new DomainError(`Latitude ${lat} is too close to a pole to project`);
  }
  const pixelCoordY = worldY * scale;
  const tileY = Math.floor(pixelCoordY / TILE_SIZE);

  // Subtraction can leave -1e-9 or 256 - 1e-12 behind for huge pixel coordinates
  return {
    zoom,
    tileX,
    tileY,
    pixelX: clampOffset(Math.floor(pixelCoordX - tileX * TILE_SIZE)),
    pixelY: clampOffset(Math.floor(pixelCoordY - tileY * TILE_SIZE))
  };
}
