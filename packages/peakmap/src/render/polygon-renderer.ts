/**
 * Polygon Renderer
 *
 * @module render/polygon-renderer
 */

import type { Geometry } from 'geojson';
import {
  POLYGON_FILL_OPACITY,
  POLYGON_STROKE_OPACITY,
  POLYGON_STROKE_WEIGHT,
} from '../core/constants.js';
import type { PolygonColors } from '../core/types.js';
import type { MapLayer, PolygonStyle } from './map-document.js';

export function polygonStyle(colors: PolygonColors): PolygonStyle {
  return {
    fillColor: colors.fill,
    fillOpacity: POLYGON_FILL_OPACITY,
    color: colors.stroke,
    weight: POLYGON_STROKE_WEIGHT,
    opacity: POLYGON_STROKE_OPACITY,
  };
}

/**
 * Add a filled outline to a layer
 *
 * Opacity and stroke weight are fixed so every region looks alike. The
 * geometry is not checked; a malformed one fails when the page draws it.
 */
export function addPolygon(layer: MapLayer, geometry: Geometry, colors: PolygonColors): void {
  layer.add({
    kind: 'polygon',
    geometry,
    style: polygonStyle(colors),
  });
}
