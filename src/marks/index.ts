export {
  MapMark,
  MIN_LAYER,
  MAX_LAYER,
  DEFAULT_GLYPH_STYLE,
  DEFAULT_CAPTION_STYLE,
  DEFAULT_CAPTION_FONT,
  type GlyphShape,
  type GlyphStyle,
  type CaptionStyle,
  type MapMarkCustomProp,
  type MapLayer,
  type MarkStyleDefaults,
  type MapMarkInit,
} from "./types";
export { resolveMarkStyle, type ResolvedMarkStyle } from "./style";
export {
  MapMarkList,
  NOT_FOUND,
  type MapMarkAction,
  type MapMarkNotify,
  type MapMarkListOptions,
} from "./MapMarkList";
