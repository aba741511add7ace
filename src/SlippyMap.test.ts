import { describe, it, expect, vi } from "vitest";
import { SlippyMap, allLayers, type SlippyMapOptions } from "./SlippyMap";
import { RecordingSurface, recordingSurfaceFactory } from "./surface/RecordingSurface";
import type { TileDrawCallback } from "./tiles/TileRenderer";
import { geoPoint, mapToGeo, MAX_LATITUDE } from "./projection/mercator";

function createMap(options: Partial<SlippyMapOptions> = {}) {
  const drawTile = vi.fn<Parameters<TileDrawCallback>, boolean>(() => true);
  const onInvalidate = vi.fn();
  const onZoomChanged = vi.fn();
  const onSelectionBox = vi.fn();
  const map = new SlippyMap({
    surfaceFactory: recordingSurfaceFactory,
    drawTile,
    onInvalidate,
    onZoomChanged,
    onSelectionBox,
    drawCopyright: false,
    drawScale: false,
    ...options,
  });
  map.setViewportSize({ width: 600, height: 400 });
  return { map, drawTile, onInvalidate, onZoomChanged, onSelectionBox };
}

describe("SlippyMap", () => {
  describe("construction", () => {
    it("starts at the minimum zoom", () => {
      const { map, onZoomChanged } = createMap();
      expect(map.zoom).toBe(0);
      expect(map.mapSize).toEqual({ width: 256, height: 256 });
      expect(onZoomChanged).toHaveBeenCalledWith(0);
    });

    it("accepts an initial zoom inside the constraints", () => {
      const { map } = createMap({ minZoom: 2, zoom: 5 });
      expect(map.zoom).toBe(5);
      expect(map.minZoom).toBe(2);
    });

    it("rejects an initial zoom outside the constraints", () => {
      expect(() => createMap({ minZoom: 2, zoom: 1 })).toThrow(RangeError);
    });

    it("shows all layers by default", () => {
      const { map } = createMap();
      expect(map.visibleLayers.size).toBe(256);
      expect(allLayers().has(255)).toBe(true);
    });
  });

  describe("viewport", () => {
    it("shows the whole zoom 0 map in a larger viewport", () => {
      const { map, drawTile } = createMap();
      drawTile.mockClear();
      map.setViewportSize({ width: 1100, height: 500 });

      expect(map.viewRect).toEqual({ left: 0, top: 0, right: 1100, bottom: 500 });
      expect(drawTile).toHaveBeenCalledTimes(1);
      expect(drawTile.mock.calls[0]?.slice(0, 2)).toEqual([{ zoom: 0, x: 0, y: 0 }, { x: 0, y: 0 }]);
    });

    it("does not scroll when the map fits the viewport", () => {
      const { map, onInvalidate } = createMap();
      onInvalidate.mockClear();
      map.scrollMapBy(50, 50);
      expect(map.viewRect.left).toBe(0);
      expect(onInvalidate).not.toHaveBeenCalled();
    });

    it("invalidates on scroll", () => {
      const { map, onInvalidate } = createMap({ zoom: 3 });
      onInvalidate.mockClear();
      map.scrollMapBy(10, 20);
      map.scrollMapTo({ x: 100, y: 100 });
      expect(map.viewRect).toEqual({ left: 100, top: 100, right: 700, bottom: 500 });
      expect(onInvalidate).toHaveBeenCalledTimes(2);
    });

    it("paints the cached map into the target", () => {
      const { map } = createMap({ zoom: 3 });
      map.scrollMapTo({ x: 300, y: 200 });
      const target = new RecordingSurface(600, 400);
      map.paint(target);
      expect(target.ops[0]).toMatchObject({ op: "blit", at: { x: 0, y: 0 } });
    });
  });

  describe("center and north-west points", () => {
    it("centers the view on a geo point", () => {
      const { map } = createMap({ zoom: 3 });
      map.centerPoint = geoPoint(0, 0);

      expect(map.viewRect).toEqual({ left: 724, top: 824, right: 1324, bottom: 1224 });
      expect(map.centerPoint.long).toBeCloseTo(0, 10);
      expect(map.centerPoint.lat).toBeCloseTo(0, 10);
    });

    it("moves the view's top-left to a geo point", () => {
      const { map } = createMap({ zoom: 3 });
      map.nwPoint = mapToGeo(3, { x: 1000, y: 500 });
      expect(map.viewRect.left).toBe(1000);
      expect(map.viewRect.top).toBe(500);
      expect(map.geoToMap(map.nwPoint)).toEqual({ x: 1000, y: 500 });
    });
  });

  describe("zoom", () => {
    it("zooms with the wheel around the cursor", () => {
      const { map, onZoomChanged } = createMap({ zoom: 3 });
      map.scrollMapTo({ x: 100, y: 100 });
      expect(map.zoomBy(1, { x: 50, y: 20 })).toBe(true);
      expect(map.zoom).toBe(4);
      expect(map.viewRect.left).toBe(250);
      expect(map.viewRect.top).toBe(220);
      expect(onZoomChanged).toHaveBeenLastCalledWith(4);
    });

    it("zooms to the largest level that fits an area", () => {
      const { map } = createMap();
      const region = mapToGeo(5, { left: 1024, top: 1024, right: 1304, bottom: 1204 });

      map.zoomToArea(region);

      expect(map.zoom).toBe(6);
      expect(map.viewRect.left).toBe(2048);
      expect(map.viewRect.top).toBe(2048);
    });

    it("falls back to the minimum zoom when an area never fits", () => {
      const { map } = createMap({ minZoom: 3, zoom: 5 });
      map.zoomToArea(mapToGeo(0, { left: 0, top: 0, right: 256, bottom: 256 }));
      expect(map.zoom).toBe(3);
      expect(map.viewRect.left).toBe(0);
    });

    it("fits the whole map", () => {
      const { map } = createMap({ zoom: 4 });
      map.zoomToFit();
      expect(map.zoom).toBe(0);
    });

    it("clamps the zoom into new constraints", () => {
      const { map } = createMap({ zoom: 8 });
      map.setZoomConstraints(2, 6);
      expect(map.zoom).toBe(6);
      expect(map.setZoom(7)).toBe(false);
      expect(() => map.setZoomConstraints(7, 6)).toThrow(RangeError);
    });
  });

  describe("interaction", () => {
    it("reports a selection dragged in any direction as a geo region", () => {
      const { map, onSelectionBox } = createMap({ zoom: 3 });
      map.scrollMapTo({ x: 100, y: 100 });

      const region = map.selectArea({ x: 50, y: 300 }, { x: 10, y: 20 });

      const expected = mapToGeo(3, { left: 110, top: 120, right: 150, bottom: 400 });
      expect(region).toEqual(expected);
      expect(onSelectionBox).toHaveBeenCalledWith(expected);
    });

    it("clamps selections to the map", () => {
      const { map } = createMap();
      const region = map.selectArea({ x: -50, y: -50 }, { x: 500, y: 500 });
      expect(region.topLeft.long).toBeCloseTo(-180, 10);
      expect(region.topLeft.lat).toBeCloseTo(MAX_LATITUDE, 10);
      expect(region.bottomRight.long).toBeCloseTo(180, 10);
    });

    it("allows dragging only from free map points", () => {
      const { map } = createMap({ zoom: 3 });
      map.mapMarks.add(mapToGeo(3, { x: 200, y: 200 }), "mark");

      expect(map.isPointFree({ x: 200, y: 200 })).toBe(false);
      expect(map.isPointFree({ x: 201, y: 200 })).toBe(true);
    });

    it("treats points beyond the map as not free", () => {
      const { map } = createMap();
      expect(map.isPointFree({ x: 300, y: 10 })).toBe(false);
    });
  });

  describe("marks and layers", () => {
    it("invalidates when marks change", () => {
      const { map, onInvalidate } = createMap();
      onInvalidate.mockClear();
      const mark = map.mapMarks.add(geoPoint(10, 10), "a");
      map.mapMarks.remove(mark);
      expect(onInvalidate).toHaveBeenCalledTimes(2);
    });

    it("creates marks with the owner's styles", () => {
      const { map } = createMap({
        markGlyphStyle: {
          shape: "square",
          size: 8,
          borderColor: "#000000",
          bgColor: "#ff0000",
        },
      });
      expect(map.mapMarks.newItem(geoPoint(0, 0)).glyphStyle.shape).toBe("square");
    });

    it("replaces the visible layer set", () => {
      const { map, onInvalidate } = createMap();
      onInvalidate.mockClear();
      map.visibleLayers = [1, 3];
      expect([...map.visibleLayers]).toEqual([1, 3]);
      expect(onInvalidate).toHaveBeenCalledTimes(1);
    });
  });

  describe("tiles", () => {
    it("refreshes a cached tile and invalidates", () => {
      const { map, drawTile, onInvalidate } = createMap();
      drawTile.mockClear();
      onInvalidate.mockClear();

      expect(map.refreshTile({ zoom: 0, x: 0, y: 0 })).toBe(true);
      expect(drawTile).toHaveBeenCalledTimes(1);
      expect(onInvalidate).toHaveBeenCalledTimes(1);
      expect(map.refreshTile({ zoom: 1, x: 0, y: 0 })).toBe(false);
    });

    it("formats tile URLs with the configured server", () => {
      const { map } = createMap({
        tileUrl: {
          prefix: "https://tiles.test/",
          pattern: "{zoom}/{x}/{y}.png",
          postfix: "",
        },
      });
      expect(map.tileUrl({ zoom: 2, x: 1, y: 3 })).toBe("https://tiles.test/2/1/3.png");
    });
  });

  it("converts with the current zoom", () => {
    const { map } = createMap();
    expect(map.geoToMap(geoPoint(0, 0))).toEqual({ x: 128, y: 128 });
    expect(map.viewToMap({ x: 5, y: 6 })).toEqual({ x: 5, y: 6 });
  });
});
