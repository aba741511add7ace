/**
 * Effective style of a mapmark.
 */

import type { FontSpec } from "../surface/types";
import type { CaptionStyle, GlyphStyle, MapMark, MarkStyleDefaults } from "./types";

export interface ResolvedMarkStyle {
  glyph: GlyphStyle;
  caption: CaptionStyle;
  font: FontSpec;
}

/**
 * Pick each style part from the mark when its custom-prop flag is set,
 * otherwise from the owner's defaults.
 */
export function resolveMarkStyle(defaults: MarkStyleDefaults, mark: MapMark): ResolvedMarkStyle {
  const props = mark.customProps;
  return {
    glyph: props.has("glyphStyle") ? mark.glyphStyle : defaults.glyphStyle,
    caption: props.has("captionStyle") ? mark.captionStyle : defaults.captionStyle,
    font: props.has("font") ? mark.captionFont : defaults.captionFont,
  };
}
