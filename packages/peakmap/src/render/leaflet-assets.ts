/**
 * Leaflet Assets
 *
 * Reads Leaflet's distributed script and stylesheet from the installed
 * package so they can be inlined into the generated page.
 *
 * @module render/leaflet-assets
 */

import { readFileSync } from 'node:fs';
import { createRequire } from 'node:module';

export interface LeafletAssets {
  readonly script: string;
  readonly stylesheet: string;
}

let cachedAssets: LeafletAssets | null = null;

/**
 * Load (once per process) leaflet/dist/leaflet.js and leaflet.css
 */
export function loadLeafletAssets(): LeafletAssets {
  if (!cachedAssets) {
    const require = createRequire(import.meta.url);
    cachedAssets = {
      script: readFileSync(require.resolve('leaflet/dist/leaflet.js'), 'utf-8'),
      stylesheet: readFileSync(require.resolve('leaflet/dist/leaflet.css'), 'utf-8'),
    };
  }
  return cachedAssets;
}
