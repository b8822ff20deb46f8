import type { CascadeEntry, TileAddress, TileSource } from '../types';

/**
 * Swap zoom bounds declared the wrong way round
 */
export function normalizeTileSource(source: TileSource): TileSource {
  if (source.maxZoom < source.minZoom) {
    return { ...source, minZoom: source.maxZoom, maxZoom: source.minZoom };
  }
  return { ...source };
}

/**
 * Expand a prioritized catalog into the ordered list of (source, zoom)
 * attempts: catalog order across sources, finest zoom first within each.
 */
export function buildCascade(catalog: readonly TileSource[]): CascadeEntry[] {
  const cascade: CascadeEntry[] = [];

  for (const rawSource of catalog) {
    const source = normalizeTileSource(rawSource);
    for (let zoom = source.maxZoom; zoom >= source.minZoom; zoom--) {
      cascade.push(Object.freeze({
        title: source.title,
        zoom,
        urlTemplate: source.urlTemplate,
        fixed: source.fixed
      }));
    }
  }

  return cascade;
}

export function makeTileUrl(entry: CascadeEntry, address: Pick<TileAddress, 'tileX' | 'tileY'>): string {
  return entry.urlTemplate
    .split('{x}').join(String(address.tileX))
    .split('{y}').join(String(address.tileY))
    .split('{z}').join(String(entry.zoom));
}
