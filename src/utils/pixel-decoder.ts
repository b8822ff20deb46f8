import { ELEVATION_ENCODING } from '../constants';
import type { PixelValue } from '../types';

const { POW2_8, POW2_16, POW2_23, POW2_24, RESOLUTION_M, SEA_MARKER } = ELEVATION_ENCODING;

/**
 * Decode one GSI elevation PNG pixel.
 *
 * Elevation is a signed 24-bit integer of centimeters packed big-endian into
 * R, G, B. (128, 0, 0) marks sea, and -2^23 is reserved for "no data".
 */
export function classifyElevationPixel(r: number, g: number, b: number): PixelValue {
  if (r === SEA_MARKER[0] && g === SEA_MARKER[1] && b === SEA_MARKER[2]) {
    return { kind: 'no-data', reason: 'sea-marker' };
  }

  const packed = r * POW2_16 + g * POW2_8 + b;
  const centimeters = packed < POW2_23 ? packed : packed - POW2_24;

  if (centimeters === -POW2_23) {
    return { kind: 'no-data', reason: 'nodata-sentinel' };
  }

  return { kind: 'elevation', meters: centimeters * RESOLUTION_M };
}

// Numeric form: no data collapses to 0
export function decodeElevationPixel(r: number, g: number, b: number): number {
  const value = classifyElevationPixel(r, g, b);
  return value.kind === 'elevation' ? value.meters : 0;
}
