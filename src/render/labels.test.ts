import { describe, it, expect } from "vitest";
import { renderCopyright, renderScaleBar, bottomLeftPlacement, bottomRightPlacement } from "./labels";
import { RecordingSurface } from "../surface/RecordingSurface";

// RecordingSurface text is 6px per character and 12px high at this size
const FONT = { family: "Arial", size: 12 };

describe("renderCopyright", () => {
  it("sizes the surface to the text on a transparent background", () => {
    const surface = new RecordingSurface();
    renderCopyright(surface, "(c) Test Tiles", FONT);

    expect([surface.width, surface.height]).toEqual([84, 12]);
    expect(surface.ops).toEqual([
      { op: "resize", width: 84, height: 12 },
      { op: "clear", rect: { left: 0, top: 0, right: 84, bottom: 12 } },
      { op: "text", text: "(c) Test Tiles", at: { x: 0, y: 0 }, style: { font: FONT, color: "#808080" } },
    ]);
  });
});

describe("renderScaleBar", () => {
  it("lays out text, gap and bar inside a frame", () => {
    const surface = new RecordingSurface();
    // Zoom 13: "1 km" over 52px
    renderScaleBar(surface, 13, FONT);

    expect([surface.width, surface.height]).toEqual([88, 16]);
    expect(surface.ops).toEqual([
      { op: "resize", width: 88, height: 16 },
      {
        op: "rectangle",
        rect: { left: 0, top: 0, right: 88, bottom: 16 },
        style: { fill: "#ffffff", stroke: "#c0c0c0" },
      },
      { op: "text", text: "1 km", at: { x: 3, y: 2 }, style: { font: FONT, color: "#000000" } },
      {
        op: "rectangle",
        rect: { left: 33, top: 5, right: 85, bottom: 11 },
        style: { fill: "#ffffff", stroke: "#000000" },
      },
    ]);
  });

  it("uses meters at high zoom levels", () => {
    const surface = new RecordingSurface();
    renderScaleBar(surface, 14, FONT);
    const text = surface.ops.find((op) => op.op === "text");
    expect(text).toMatchObject({ text: "500 m" });
  });
});

describe("label placement", () => {
  const viewport = { width: 600, height: 400 };

  it("anchors labels to the bottom corners with a margin", () => {
    expect(bottomRightPlacement(viewport, { width: 180, height: 12 })).toEqual({ x: 418, y: 386 });
    expect(bottomLeftPlacement(viewport, { width: 88, height: 16 })).toEqual({ x: 2, y: 382 });
  });
});
