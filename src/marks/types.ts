/**
 * Mapmark Types
 *
 * Point annotations drawn over the map, with per-mark style overrides.
 */

import type { GeoPoint } from "../projection/types";
import type { Color, FontSpec } from "../surface/types";

/** Shape of a mapmark glyph */
export type GlyphShape = "circle" | "square" | "triangle";

/** Visual properties of a mapmark's glyph */
export interface GlyphStyle {
  shape: GlyphShape;
  /** Width and height in pixels */
  size: number;
  borderColor: Color;
  bgColor: Color;
}

/** Visual properties of a mapmark's caption */
export interface CaptionStyle {
  color: Color;
  bgColor: Color;
  /** Offset from the glyph's top-right corner */
  dx: number;
  dy: number;
  /** Draw without background */
  transparent: boolean;
}

/**
 * Properties a mark takes from itself instead of its owner's defaults.
 */
export type MapMarkCustomProp = "glyphStyle" | "captionStyle" | "font";

/** Layer number, 0..255 */
export type MapLayer = number;

export const MIN_LAYER = 0;
export const MAX_LAYER = 255;

/** Owner-level defaults for mapmark drawing */
export interface MarkStyleDefaults {
  glyphStyle: GlyphStyle;
  captionStyle: CaptionStyle;
  captionFont: FontSpec;
}

export const DEFAULT_GLYPH_STYLE: Readonly<GlyphStyle> = {
  shape: "circle",
  size: 20,
  borderColor: "#646464",
  bgColor: "#a6caf0",
};

export const DEFAULT_CAPTION_STYLE: Readonly<CaptionStyle> = {
  color: "#000000",
  bgColor: "#ffffff",
  dx: 3,
  dy: 0,
  transparent: true,
};

export const DEFAULT_CAPTION_FONT: Readonly<FontSpec> = {
  family: "sans-serif",
  size: 12,
};

/** Fields accepted when creating a mark */
export interface MapMarkInit {
  coord: GeoPoint;
  caption?: string;
  visible?: boolean;
  layer?: MapLayer;
  customProps?: Iterable<MapMarkCustomProp>;
  glyphStyle?: GlyphStyle;
  captionStyle?: CaptionStyle;
  captionFont?: FontSpec;
  data?: unknown;
}

/**
 * A single mapmark. Marks are compared by identity, so the same object
 * must be passed back to remove it from its list. Change `layer` only
 * while the mark is not in a list; the list's order depends on it.
 */
export class MapMark {
  coord: GeoPoint;
  caption: string;
  visible: boolean;
  layer: MapLayer;
  customProps: Set<MapMarkCustomProp>;
  glyphStyle: GlyphStyle;
  captionStyle: CaptionStyle;
  captionFont: FontSpec;
  /** User data */
  data: unknown;

  constructor(init: MapMarkInit) {
    this.coord = init.coord;
    this.caption = init.caption ?? "";
    this.visible = init.visible ?? true;
    this.layer = init.layer ?? MIN_LAYER;
    this.customProps = new Set(init.customProps);
    this.glyphStyle = { ...(init.glyphStyle ?? DEFAULT_GLYPH_STYLE) };
    this.captionStyle = { ...(init.captionStyle ?? DEFAULT_CAPTION_STYLE) };
    this.captionFont = { ...(init.captionFont ?? DEFAULT_CAPTION_FONT) };
    this.data = init.data;
  }
}
