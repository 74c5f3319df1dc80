/**
 * Marker/Label Renderer
 *
 * Each peak is drawn as two markers at the same point: a colored pin whose
 * popup links to the peak's page, and a static text label just below it.
 * Leaflet has no pin-with-subtitle primitive, hence the pair.
 *
 * @module render/marker-renderer
 */

import { LABEL_OFFSET_PX, PLACEHOLDER_URL, POPUP_MAX_WIDTH } from '../core/constants.js';
import { escapeHtml } from '../core/utils/html.js';
import type { MapLayer } from './map-document.js';

export interface PeakMarkerInput {
  readonly latitude: number;
  readonly longitude: number;
  readonly name: string | null;
  readonly url: string | null;
  /** Pin color, already resolved from climb status */
  readonly color: string;
}

/**
 * Popup body: the peak name as a link opening in a new tab
 */
export function buildPopupHtml(safeName: string, safeUrl: string): string {
  return (
    '<div style="text-align:center; font-weight:bold">' +
    `<a href="${safeUrl}" target="_blank" rel="noopener noreferrer" style="color:black">` +
    `${safeName}</a></div>`
  );
}

/**
 * Label body: centered bold text pushed below the pin, ignoring the pointer
 */
export function buildLabelHtml(safeName: string): string {
  return (
    '<div style="pointer-events:none; text-align:center; white-space:nowrap; ' +
    `transform: translate(-50%, ${LABEL_OFFSET_PX}px); ` +
    `font-size:12px; font-weight:bold; color:black;">${safeName}</div>`
  );
}

/**
 * Add a peak's pin and label to a layer
 *
 * Name and URL are HTML-escaped before they reach any markup. A missing or
 * blank URL links to `#`; a missing name renders as empty text. Calling this
 * twice adds two independent pairs.
 */
export function addMarkerAndLabel(layer: MapLayer, input: PeakMarkerInput): void {
  const safeName = escapeHtml(input.name ?? '');
  const url = input.url?.trim();
  const safeUrl = escapeHtml(url ? url : PLACEHOLDER_URL);
  const position = { lat: input.latitude, lng: input.longitude };

  layer.add({
    kind: 'pin',
    position,
    color: input.color,
    popupHtml: buildPopupHtml(safeName, safeUrl),
    popupMaxWidth: POPUP_MAX_WIDTH,
  });

  layer.add({
    kind: 'label',
    position,
    html: buildLabelHtml(safeName),
  });
}
