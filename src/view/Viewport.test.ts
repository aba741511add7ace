import { describe, it, expect } from "vitest";
import { Viewport } from "./Viewport";

function createViewport(map = 1024) {
  const viewport = new Viewport();
  viewport.setMapSize({ width: map, height: map });
  viewport.setSize({ width: 600, height: 400 });
  return viewport;
}

describe("Viewport", () => {
  it("derives the view rect from scroll offset and size", () => {
    const viewport = createViewport();
    viewport.scrollTo({ x: 100, y: 50 });
    expect(viewport.viewRect).toEqual({ left: 100, top: 50, right: 700, bottom: 450 });
  });

  it("clamps scrolling to the map", () => {
    const viewport = createViewport();
    expect(viewport.scrollRange).toEqual({ width: 424, height: 624 });
    expect(viewport.scrollTo({ x: 900, y: 900 })).toBe(true);
    expect(viewport.scrollOffset).toEqual({ x: 424, y: 624 });
    expect(viewport.scrollBy(-1000, -1000)).toBe(true);
    expect(viewport.scrollOffset).toEqual({ x: 0, y: 0 });
  });

  it("reports unchanged offsets", () => {
    const viewport = createViewport();
    viewport.scrollTo({ x: 10, y: 10 });
    expect(viewport.scrollTo({ x: 10, y: 10 })).toBe(false);
    expect(viewport.scrollBy(0, 0)).toBe(false);
  });

  it("pins the view at the origin when the map is smaller than the viewport", () => {
    const viewport = createViewport(256);
    expect(viewport.scrollRange).toEqual({ width: 0, height: 0 });
    expect(viewport.scrollTo({ x: 50, y: 50 })).toBe(false);
    expect(viewport.viewRect).toEqual({ left: 0, top: 0, right: 600, bottom: 400 });
  });

  it("re-clamps the offset when the map shrinks", () => {
    const viewport = createViewport(4096);
    viewport.scrollTo({ x: 3000, y: 3000 });
    viewport.setMapSize({ width: 1024, height: 1024 });
    expect(viewport.scrollOffset).toEqual({ x: 424, y: 624 });
  });

  it("converts between view and map pixels", () => {
    const viewport = createViewport();
    viewport.scrollTo({ x: 200, y: 300 });
    expect(viewport.viewToMap({ x: 10, y: 20 })).toEqual({ x: 210, y: 320 });
    expect(viewport.mapToView({ x: 210, y: 320 })).toEqual({ x: 10, y: 20 });
    expect(viewport.viewToMap({ left: 0, top: 0, right: 5, bottom: 5 })).toEqual({
      left: 200,
      top: 300,
      right: 205,
      bottom: 305,
    });
  });

  it("rejects negative sizes", () => {
    const viewport = new Viewport();
    expect(() => viewport.setSize({ width: -1, height: 10 })).toThrow(RangeError);
  });
});
