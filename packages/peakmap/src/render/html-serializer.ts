/**
 * HTML Serializer
 *
 * Turns a finished map document into a single page: Leaflet inlined, the
 * document embedded as JSON, and a short bootstrap script that replays it
 * as Leaflet layers.
 *
 * @module render/html-serializer
 */

import { escapeHtml, toScriptSafeJson } from '../core/utils/html.js';
import { loadLeafletAssets, type LeafletAssets } from './leaflet-assets.js';
import type { MapDocument } from './map-document.js';

export interface RenderHtmlOptions {
  /** Page title (escaped) */
  readonly title: string;
  /** Leaflet script/stylesheet; read from the installed package when omitted */
  readonly assets?: LeafletAssets;
}

/** Element id of the embedded document JSON */
export const DATA_ELEMENT_ID = 'peakmap-data';

const PAGE_STYLES = `
html, body, #map { height: 100%; margin: 0; }
.peakmap-pin, .peakmap-label { background: none; border: none; }
`;

/**
 * Client-side bootstrap: reads the embedded snapshot and builds the map.
 * Layers with show=false are created and listed in the control but not
 * added to the map.
 */
export const BOOTSTRAP_SCRIPT = `
(function () {
  var data = JSON.parse(document.getElementById('${DATA_ELEMENT_ID}').textContent);

  function escapeAttribute(value) {
    return String(value)
      .replace(/&/g, '&amp;')
      .replace(/"/g, '&quot;')
      .replace(/</g, '&lt;')
      .replace(/>/g, '&gt;');
  }

  function pinIcon(color) {
    var svg = '<svg xmlns="http://www.w3.org/2000/svg" width="25" height="41" viewBox="0 0 25 41">' +
      '<path d="M12.5 0C5.6 0 0 5.6 0 12.5C0 21.9 12.5 41 12.5 41S25 21.9 25 12.5C25 5.6 19.4 0 12.5 0z" ' +
      'fill="' + escapeAttribute(color) + '" stroke="#333" stroke-width="1"/>' +
      '<circle cx="12.5" cy="12.5" r="4.5" fill="#fff"/></svg>';
    return L.divIcon({ html: svg, className: 'peakmap-pin', iconSize: [25, 41], iconAnchor: [12, 41], popupAnchor: [1, -34] });
  }

  function addElement(group, el) {
    var latlng = el.position ? [el.position.lat, el.position.lng] : null;
    if (el.kind === 'polygon') {
      L.geoJSON(el.geometry, { style: function () { return el.style; } }).addTo(group);
    } else if (el.kind === 'pin') {
      L.marker(latlng, { icon: pinIcon(el.color) })
        .bindPopup(el.popupHtml, { maxWidth: el.popupMaxWidth })
        .addTo(group);
    } else if (el.kind === 'label') {
      L.marker(latlng, {
        icon: L.divIcon({ html: el.html, className: 'peakmap-label', iconSize: null }),
        interactive: false,
        keyboard: false
      }).addTo(group);
    }
  }

  var map = L.map('map', { center: [data.center.lat, data.center.lng], zoom: data.zoom });
  var base = L.tileLayer(data.tiles.url, {
    attribution: data.tiles.attribution,
    maxZoom: data.tiles.maxZoom
  }).addTo(map);

  var overlays = {};
  data.layers.forEach(function (layer) {
    var group = L.featureGroup();
    layer.elements.forEach(function (el) { addElement(group, el); });
    if (layer.show) {
      group.addTo(map);
    }
    overlays[layer.name] = group;
  });

  if (data.layerControl) {
    var bases = {};
    bases[data.tiles.name] = base;
    L.control.layers(bases, overlays, { collapsed: data.layerControl.collapsed }).addTo(map);
  }
})();
`;

/**
 * Keep inlined third-party script text from closing its element
 */
function inlineScript(source: string): string {
  return source.replace(/<\/script/gi, '<\\/script');
}

function inlineStyle(source: string): string {
  return source.replace(/<\/style/gi, '<\\/style');
}

/**
 * Render the whole page
 */
export function renderHtml(document: MapDocument, options: RenderHtmlOptions): string {
  const assets = options.assets ?? loadLeafletAssets();
  const data = toScriptSafeJson(document.toSnapshot());

  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '<meta charset="utf-8">',
    '<meta name="viewport" content="width=device-width, initial-scale=1">',
    `<title>${escapeHtml(options.title)}</title>`,
    `<style>${inlineStyle(assets.stylesheet)}</style>`,
    `<style>${PAGE_STYLES}</style>`,
    '</head>',
    '<body>',
    '<div id="map"></div>',
    `<script>${inlineScript(assets.script)}</script>`,
    `<script type="application/json" id="${DATA_ELEMENT_ID}">${data}</script>`,
    `<script>${BOOTSTRAP_SCRIPT}</script>`,
    '</body>',
    '</html>',
    '',
  ].join('\n');
}
