export type {
  Color,
  FontSpec,
  ShapeStyle,
  TextStyle,
  DrawSurface,
  SurfaceFactory,
} from "./types";
export { fontToCss } from "./types";
export {
  CanvasSurface,
  canvasSurfaceFactory,
  type CanvasLike,
  type Canvas2DContextLike,
} from "./CanvasSurface";
export { RecordingSurface, recordingSurfaceFactory, type DrawOp } from "./RecordingSurface";
