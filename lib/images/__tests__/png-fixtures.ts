import { PNG } from "pngjs";
import type { RenderedPage } from "../../pipeline/core/types";

type Rgba = [number, number, number, number];

/**
 * Build a PNG of the given size. Default fill encodes the coordinates:
 * red = x * 20, green = y * 20 (wrapping at 256).
 */
export function makePng(
  width: number,
  height: number,
  fill: (x: number, y: number) => Rgba = (x, y) => [(x * 20) % 256, (y * 20) % 256, 0, 255]
): Buffer {
  const png = new PNG({ width, height });
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const i = (y * width + x) * 4;
      const [r, g, b, a] = fill(x, y);
      png.data[i] = r;
      png.data[i + 1] = g;
      png.data[i + 2] = b;
      png.data[i + 3] = a;
    }
  }
  return PNG.sync.write(png);
}

export function makePage(
  pageNumber: number,
  width: number,
  height: number
): RenderedPage {
  return { pageNumber, pngBuffer: makePng(width, height), width, height };
}
