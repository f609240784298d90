/**
 * Packs RGBA pixels into BGR24. Alpha is dropped, not blended; callers that
 * need a composited result draw onto an opaque surface first.
 */
export function rgbaToBgr(rgba: Uint8Array | Uint8ClampedArray, width: number, height: number): Buffer {
  const pixelCount = width * height;
  if (rgba.length !== pixelCount * 4) {
    throw new RangeError(
      `Expected ${pixelCount * 4} bytes for ${width}x${height} RGBA, received ${rgba.length}`,
    );
  }

  const bgr = Buffer.alloc(pixelCount * 3);
  for (let pixel = 0; pixel < pixelCount; pixel += 1) {
    const source = pixel * 4;
    const target = pixel * 3;
    bgr[target] = rgba[source + 2] ?? 0;
    bgr[target + 1] = rgba[source + 1] ?? 0;
    bgr[target + 2] = rgba[source] ?? 0;
  }

  return bgr;
}
