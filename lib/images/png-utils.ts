import { PNG } from "pngjs";

export interface PngMetadata {
  width: number;
  height: number;
}

export interface CropRegion {
  left: number;
  top: number;
  width: number;
  height: number;
}

/**
 * Read PNG width and height from the IHDR chunk (bytes 16-23)
 * without decoding pixel data.
 */
export function getPngMetadata(pngBuffer: Buffer): PngMetadata {
  if (pngBuffer.length < 24) {
    throw new Error(`Not a PNG: ${pngBuffer.length} bytes`);
  }
  return {
    width: pngBuffer.readUInt32BE(16),
    height: pngBuffer.readUInt32BE(20),
  };
}

export function decodePng(pngBuffer: Buffer): {
  data: Buffer;
  width: number;
  height: number;
} {
  const png = PNG.sync.read(pngBuffer);
  return { data: png.data, width: png.width, height: png.height };
}

export function cropPng(pngBuffer: Buffer, region: CropRegion): Buffer {
  const { data, width, height } = decodePng(pngBuffer);
  const { left, top, width: cropW, height: cropH } = region;

  if (
    !Number.isInteger(left) ||
    !Number.isInteger(top) ||
    !Number.isInteger(cropW) ||
    !Number.isInteger(cropH) ||
    cropW < 1 ||
    cropH < 1 ||
    left < 0 ||
    top < 0 ||
    left + cropW > width ||
    top + cropH > height
  ) {
    throw new Error(
      `Crop region ${cropW}x${cropH}+${left}+${top} is outside the ${width}x${height} image`
    );
  }

  // pngjs always decodes to RGBA
  const cropData = Buffer.alloc(cropW * cropH * 4);
  for (let y = 0; y < cropH; y++) {
    const srcOffset = ((top + y) * width + left) * 4;
    const dstOffset = y * cropW * 4;
    data.copy(cropData, dstOffset, srcOffset, srcOffset + cropW * 4);
  }

  const png = new PNG({ width: cropW, height: cropH });
  png.data = cropData;
  return PNG.sync.write(png);
}
