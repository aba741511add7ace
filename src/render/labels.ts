/**
 * Map labels: the copyright notice and the scale bar.
 *
 * Both are rendered onto their own small surfaces and blitted over the
 * map on every paint.
 */

import type { Point, Size } from "../projection/types";
import { getScaleBarParams } from "../projection/scaleBar";
import type { Color, DrawSurface, FontSpec } from "../surface/types";

/** Distance of labels from the viewport edges and inner padding of the scale bar */
export const LABEL_MARGIN = 2;

export const DEFAULT_LABEL_FONT: Readonly<FontSpec> = {
  family: "Arial",
  size: 11,
};

const COPYRIGHT_COLOR: Color = "#808080";
const SCALE_FRAME = { fill: "#ffffff", stroke: "#c0c0c0" };
const SCALE_BAR = { fill: "#ffffff", stroke: "#000000" };
const SCALE_TEXT_COLOR: Color = "#000000";

/** Size the surface to the text and draw it on a transparent background */
export function renderCopyright(surface: DrawSurface, text: string, font: FontSpec): void {
  const extent = surface.measureText(text, font);
  surface.resize(extent.width, extent.height);
  surface.clear({ left: 0, top: 0, right: extent.width, bottom: extent.height });
  surface.drawText(text, { x: 0, y: 0 }, { font, color: COPYRIGHT_COLOR });
}

/**
 * Size the surface and draw the framed scale bar for a zoom level:
 * the distance text, a letter-wide gap, then the bar itself.
 */
export function renderScaleBar(surface: DrawSurface, zoom: number, font: FontSpec): void {
  const params = getScaleBarParams(zoom);
  const textExt = surface.measureText(params.text, font);
  const letterWidth = surface.measureText("W", font).width;

  const width = letterWidth + textExt.width + letterWidth + params.widthPx;
  const height = 2 * LABEL_MARGIN + textExt.height;
  surface.resize(width, height);

  surface.rectangle({ left: 0, top: 0, right: width, bottom: height }, SCALE_FRAME);
  surface.drawText(
    params.text,
    { x: Math.floor(letterWidth / 2), y: LABEL_MARGIN },
    { font, color: SCALE_TEXT_COLOR }
  );

  const barHeight = Math.floor(textExt.height / 2);
  const barLeft = Math.floor(letterWidth / 2) + textExt.width + letterWidth;
  const barTop = Math.floor((height - barHeight) / 2);
  surface.rectangle(
    {
      left: barLeft,
      top: barTop,
      right: barLeft + params.widthPx,
      bottom: barTop + barHeight,
    },
    SCALE_BAR
  );
}

/** Top-left of a label in the bottom-right corner of a viewport */
export function bottomRightPlacement(viewport: Size, label: Size): Point {
  return {
    x: viewport.width - label.width - LABEL_MARGIN,
    y: viewport.height - label.height - LABEL_MARGIN,
  };
}

/** Top-left of a label in the bottom-left corner of a viewport */
export function bottomLeftPlacement(viewport: Size, label: Size): Point {
  return {
    x: LABEL_MARGIN,
    y: viewport.height - label.height - LABEL_MARGIN,
  };
}
