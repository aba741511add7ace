export { MapRenderer, type MapRendererOptions, type MapMarkDrawCallback } from "./MapRenderer";
export {
  LABEL_MARGIN,
  DEFAULT_LABEL_FONT,
  renderCopyright,
  renderScaleBar,
  bottomLeftPlacement,
  bottomRightPlacement,
} from "./labels";
