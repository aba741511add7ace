export { Viewport } from "./Viewport";
export { ViewportCache, type ViewportCacheOptions } from "./ViewportCache";
export { ZoomController, type ZoomControllerOptions } from "./ZoomController";
