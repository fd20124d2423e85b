import { describe, it, expect } from "vitest";
import { cropPng, decodePng, getPngMetadata } from "../png-utils";
import { makePng } from "./png-fixtures";

describe("getPngMetadata", () => {
  it("reads the size from the header", () => {
    expect(getPngMetadata(makePng(7, 3))).toEqual({ width: 7, height: 3 });
  });

  it("rejects a truncated buffer", () => {
    expect(() => getPngMetadata(Buffer.alloc(10))).toThrow("Not a PNG: 10 bytes");
  });
});

describe("cropPng", () => {
  it("copies the region row by row", () => {
    const crop = decodePng(
      cropPng(makePng(6, 5), { left: 1, top: 2, width: 3, height: 2 })
    );

    expect([crop.width, crop.height]).toEqual([3, 2]);
    // Source pixel (1, 2) and (3, 3)
    expect([...crop.data.subarray(0, 4)]).toEqual([20, 40, 0, 255]);
    expect([...crop.data.subarray(20, 24)]).toEqual([60, 60, 0, 255]);
  });

  it("crops the whole image", () => {
    const source = makePng(4, 4);
    const crop = decodePng(cropPng(source, { left: 0, top: 0, width: 4, height: 4 }));
    expect(crop.data.equals(decodePng(source).data)).toBe(true);
  });

  it("rejects regions outside the image", () => {
    const png = makePng(4, 4);
    expect(() => cropPng(png, { left: 2, top: 0, width: 3, height: 1 })).toThrow(
      "Crop region 3x1+2+0 is outside the 4x4 image"
    );
    expect(() => cropPng(png, { left: 0, top: 0, width: 0, height: 1 })).toThrow(
      "Crop region 0x1+0+0 is outside the 4x4 image"
    );
    expect(() => cropPng(png, { left: 0.5, top: 0, width: 1, height: 1 })).toThrow(
      "Crop region 1x1+0.5+0 is outside the 4x4 image"
    );
  });
});
