/**
 * Map Document Model
 *
 * In-memory description of the page: base view, one tile source, ordered
 * overlay layers and the layer-visibility control. Renderers append elements
 * to layers; the HTML serializer turns a snapshot into Leaflet calls.
 *
 * @module render/map-document
 */

import type { Geometry } from 'geojson';
import type { PathOptions } from 'leaflet';
import { DuplicateLayerError } from '../core/errors.js';
import type { Coordinates, TileSource } from '../core/types.js';

// ============================================================================
// Elements
// ============================================================================

/**
 * Interactive pin with a popup
 */
export interface PinElement {
  readonly kind: 'pin';
  readonly position: Coordinates;
  readonly color: string;
  readonly popupHtml: string;
  readonly popupMaxWidth: number;
}

/**
 * Non-interactive text marker
 */
export interface LabelElement {
  readonly kind: 'label';
  readonly position: Coordinates;
  readonly html: string;
}

/**
 * Leaflet path style applied to a polygon overlay
 */
export type PolygonStyle = Readonly<
  Required<Pick<PathOptions, 'fillColor' | 'fillOpacity' | 'color' | 'weight' | 'opacity'>>
>;

/**
 * Styled GeoJSON geometry
 */
export interface PolygonElement {
  readonly kind: 'polygon';
  readonly geometry: Geometry;
  readonly style: PolygonStyle;
}

export type MapElement = PinElement | LabelElement | PolygonElement;

// ============================================================================
// Layers
// ============================================================================

/**
 * Named group of elements toggled together in the layer control
 */
export class MapLayer {
  private readonly items: MapElement[] = [];

  constructor(
    readonly name: string,
    readonly show: boolean
  ) {}

  add(element: MapElement): this {
    this.items.push(element);
    return this;
  }

  get elements(): readonly MapElement[] {
    return this.items;
  }

  /** Pins in this layer (one per rendered peak) */
  get pins(): readonly PinElement[] {
    return this.items.filter((item): item is PinElement => item.kind === 'pin');
  }

  get labels(): readonly LabelElement[] {
    return this.items.filter((item): item is LabelElement => item.kind === 'label');
  }

  get polygons(): readonly PolygonElement[] {
    return this.items.filter((item): item is PolygonElement => item.kind === 'polygon');
  }
}

// ============================================================================
// Document
// ============================================================================

export interface LayerControlOptions {
  readonly collapsed: boolean;
}

export interface MapDocumentOptions {
  readonly center: Coordinates;
  readonly zoom: number;
  readonly tiles: TileSource;
}

/**
 * Plain-data form of a document, as embedded in the HTML page
 */
export interface MapDocumentSnapshot {
  readonly center: Coordinates;
  readonly zoom: number;
  readonly tiles: TileSource;
  readonly layers: readonly {
    readonly name: string;
    readonly show: boolean;
    readonly elements: readonly MapElement[];
  }[];
  readonly layerControl: LayerControlOptions | null;
}

export class MapDocument {
  readonly center: Coordinates;
  readonly zoom: number;
  readonly tiles: TileSource;
  private readonly layerList: MapLayer[] = [];
  private control: LayerControlOptions | null = null;

  constructor(options: MapDocumentOptions) {
    this.center = options.center;
    this.zoom = options.zoom;
    this.tiles = options.tiles;
  }

  /**
   * Create and attach a new overlay layer
   *
   * @throws DuplicateLayerError if a layer with this name exists
   */
  addLayer(name: string, options: { readonly show: boolean }): MapLayer {
    if (this.getLayer(name)) {
      throw new DuplicateLayerError(name);
    }
    const layer = new MapLayer(name, options.show);
    this.layerList.push(layer);
    return layer;
  }

  getLayer(name: string): MapLayer | undefined {
    return this.layerList.find((layer) => layer.name === name);
  }

  get layers(): readonly MapLayer[] {
    return this.layerList;
  }

  addLayerControl(options: LayerControlOptions): void {
    this.control = options;
  }

  get layerControl(): LayerControlOptions | null {
    return this.control;
  }

  toSnapshot(): MapDocumentSnapshot {
    return {
      center: this.center,
      zoom: this.zoom,
      tiles: this.tiles,
      layers: this.layerList.map((layer) => ({
        name: layer.name,
        show: layer.show,
        elements: [...layer.elements],
      })),
      layerControl: this.control,
    };
  }
}
