import { describe, it, expect, vi, afterEach } from "vitest";
import { TileRenderer, loadingLabel, type TileDrawCallback } from "./TileRenderer";
import { formatTilePath, formatTileUrl, DEFAULT_TILE_URL } from "./tileUrl";
import { RecordingSurface } from "../surface/RecordingSurface";

const FONT = { family: "sans-serif", size: 12 };
const TILE = { zoom: 3, x: 5, y: 2 };

function createRenderer(drawTile?: TileDrawCallback, drawTileLoading?: TileDrawCallback) {
  return new TileRenderer({ drawTile, drawTileLoading, background: "#eeeeee", font: FONT });
}

describe("TileRenderer", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("uses the tile callback when it handles the tile", () => {
    const drawTile = vi.fn<Parameters<TileDrawCallback>, boolean>(() => true);
    const drawTileLoading = vi.fn<Parameters<TileDrawCallback>, boolean>(() => true);
    const surface = new RecordingSurface(512, 512);

    expect(createRenderer(drawTile, drawTileLoading).draw(TILE, { x: 256, y: 0 }, surface)).toBe("tile");
    expect(drawTile).toHaveBeenCalledWith(TILE, { x: 256, y: 0 }, surface);
    expect(drawTileLoading).not.toHaveBeenCalled();
    expect(surface.ops).toEqual([]);
  });

  it("falls back to the loading callback", () => {
    const drawTile = vi.fn<Parameters<TileDrawCallback>, boolean>(() => false);
    const drawTileLoading = vi.fn<Parameters<TileDrawCallback>, boolean>(() => true);

    expect(createRenderer(drawTile, drawTileLoading).draw(TILE, { x: 0, y: 0 }, new RecordingSurface())).toBe(
      "loading"
    );
    expect(drawTileLoading).toHaveBeenCalledTimes(1);
  });

  it("draws a centered placeholder when nothing handles the tile", () => {
    const surface = new RecordingSurface(512, 512);
    expect(createRenderer().draw({ zoom: 1, x: 0, y: 0 }, { x: 256, y: 256 }, surface)).toBe("placeholder");

    // "Loading [0 : 0]..." is 18 characters, 6px each at size 12
    expect(surface.ops).toEqual([
      {
        op: "rectangle",
        rect: { left: 256, top: 256, right: 512, bottom: 512 },
        style: { fill: "#eeeeee", stroke: "#808080" },
      },
      {
        op: "text",
        text: "Loading [0 : 0]...",
        at: { x: 256 + 74, y: 256 + 122 },
        style: { font: FONT, color: "#008000" },
      },
    ]);
  });

  it("logs a throwing callback and continues with the next stage", () => {
    const error = new Error("decode failed");
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const drawTile = vi.fn<Parameters<TileDrawCallback>, boolean>(() => {
      throw error;
    });
    const drawTileLoading = vi.fn<Parameters<TileDrawCallback>, boolean>(() => true);

    expect(createRenderer(drawTile, drawTileLoading).draw(TILE, { x: 0, y: 0 }, new RecordingSurface())).toBe(
      "loading"
    );
    expect(consoleError).toHaveBeenCalledWith("[TileRenderer] drawTile failed for tile 3 * [5 : 2]:", error);
  });

  it("formats the loading label", () => {
    expect(loadingLabel(TILE)).toBe("Loading [5 : 2]...");
  });
});

describe("tile URLs", () => {
  it("formats the default OSM URL", () => {
    expect(formatTileUrl(DEFAULT_TILE_URL, TILE)).toBe("https://tile.openstreetmap.org/3/5/2.png");
  });

  it("wraps a custom pattern in prefix and postfix", () => {
    const config = { prefix: "https://tiles.test/", pattern: "z{zoom}/{y}/{x}", postfix: ".jpg?key=test-key" };
    expect(formatTileUrl(config, TILE)).toBe("https://tiles.test/z3/2/5.jpg?key=test-key");
  });

  it("replaces repeated placeholders", () => {
    expect(formatTilePath("{x}-{x}", TILE)).toBe("5-5");
  });

  it("rejects invalid tiles", () => {
    expect(() => formatTileUrl(DEFAULT_TILE_URL, { zoom: 3, x: 8, y: 0 })).toThrow(RangeError);
  });
});
