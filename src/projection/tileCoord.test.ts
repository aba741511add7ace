/**
 * Tile Coordinate Tests
 */

import { describe, it, expect } from "vitest";
import {
  tileCount,
  mapWidth,
  mapHeight,
  tileValid,
  assertValidTile,
  tileToString,
  tilesEqual,
  tileRect,
  toTileWidthLesser,
  toTileWidthGreater,
  toTileHeightGreater,
  tileBoundaryAlign,
  TILE_WIDTH,
  TILE_HEIGHT,
} from "./tileCoord";

describe("map extents", () => {
  it("doubles per zoom level", () => {
    expect(tileCount(0)).toBe(1);
    expect(tileCount(3)).toBe(8);
    expect(mapWidth(0)).toBe(256);
    expect(mapHeight(2)).toBe(1024);
    expect(mapWidth(19)).toBe(134217728);
  });
});

describe("tileValid", () => {
  it("accepts tiles inside the grid", () => {
    expect(tileValid({ zoom: 0, x: 0, y: 0 })).toBe(true);
    expect(tileValid({ zoom: 2, x: 3, y: 3 })).toBe(true);
  });

  it("rejects tiles outside the grid or with a bad zoom", () => {
    expect(tileValid({ zoom: 2, x: 4, y: 0 })).toBe(false);
    expect(tileValid({ zoom: 2, x: 0, y: -1 })).toBe(false);
    expect(tileValid({ zoom: 20, x: 0, y: 0 })).toBe(false);
    expect(() => assertValidTile({ zoom: 1, x: 2, y: 0 })).toThrow("Invalid tile 1 * [2 : 0]");
  });
});

describe("tile identity", () => {
  it("formats tiles", () => {
    expect(tileToString({ zoom: 5, x: 10, y: 12 })).toBe("5 * [10 : 12]");
  });

  it("compares tiles", () => {
    expect(tilesEqual({ zoom: 1, x: 1, y: 0 }, { zoom: 1, x: 1, y: 0 })).toBe(true);
    expect(tilesEqual({ zoom: 1, x: 1, y: 0 }, { zoom: 2, x: 1, y: 0 })).toBe(false);
  });

  it("gives the pixel rect of a tile", () => {
    expect(tileRect({ zoom: 3, x: 2, y: 5 })).toEqual({ left: 512, top: 1280, right: 768, bottom: 1536 });
  });
});

describe("tile alignment", () => {
  it("floors and ceils to tile multiples", () => {
    expect(toTileWidthLesser(300)).toBe(256);
    expect(toTileWidthLesser(512)).toBe(512);
    expect(toTileWidthGreater(300)).toBe(512);
    expect(toTileWidthGreater(512)).toBe(512);
    expect(toTileHeightGreater(1)).toBe(256);
  });

  it("aligns a rect outwards", () => {
    expect(tileBoundaryAlign({ left: 100, top: 300, right: 700, bottom: 700 })).toEqual({
      left: 0,
      top: 256,
      right: 768,
      bottom: 768,
    });
  });

  it("never shrinks a rect and always lands on tile multiples", () => {
    const rects = [
      { left: 0, top: 0, right: 1, bottom: 1 },
      { left: 255, top: 257, right: 1000, bottom: 4000 },
      { left: 512, top: 512, right: 1024, bottom: 1024 },
      { left: 13, top: 77, right: 9999, bottom: 601 },
    ];
    for (const r of rects) {
      const aligned = tileBoundaryAlign(r);
      expect(aligned.left).toBeLessThanOrEqual(r.left);
      expect(aligned.top).toBeLessThanOrEqual(r.top);
      expect(aligned.right).toBeGreaterThanOrEqual(r.right);
      expect(aligned.bottom).toBeGreaterThanOrEqual(r.bottom);
      expect(aligned.left % TILE_WIDTH).toBe(0);
      expect(aligned.right % TILE_WIDTH).toBe(0);
      expect(aligned.top % TILE_HEIGHT).toBe(0);
      expect(aligned.bottom % TILE_HEIGHT).toBe(0);
    }
  });
});
