import type { ImageBuffer, Orientation } from '../models/index.js';
import { UPRIGHT, channelCount, toOrientation } from '../models/index.js';

type PixelMapping = (x: number, y: number, width: number, height: number) => [number, number];

// Where source pixel (x, y) of a width x height buffer lands once upright.
const MAPPINGS: Record<Orientation, PixelMapping> = {
  1: (x, y) => [x, y],
  2: (x, y, w) => [w - 1 - x, y],
  3: (x, y, w, h) => [w - 1 - x, h - 1 - y],
  4: (x, y, _w, h) => [x, h - 1 - y],
  5: (x, y) => [y, x],
  6: (x, y, _w, h) => [h - 1 - y, x],
  7: (x, y, w, h) => [h - 1 - y, w - 1 - x],
  8: (x, y, w) => [y, w - 1 - x],
};

export function swapsAxes(orientation: Orientation): boolean {
  return orientation >= 5;
}

export function uprightSize(
  width: number,
  height: number,
  orientation: Orientation,
): { width: number; height: number } {
  return swapsAxes(orientation) ? { width: height, height: width } : { width, height };
}

/**
 * Physically rotates/mirrors the pixels so the buffer reads upright.
 * Unrecognized tags are treated as upright.
 */
export function normalizeOrientation(buffer: ImageBuffer, tag?: unknown): ImageBuffer {
  const orientation = toOrientation(tag ?? buffer.orientation);
  const channels = channelCount(buffer.layout);
  const { width, height } = buffer;
  const size = uprightSize(width, height, orientation);
  const outStride = size.width * channels;
  const data = new Uint8Array(outStride * size.height);
  const mapping = MAPPINGS[orientation];

  for (let y = 0; y < height; y++) {
    const rowStart = y * buffer.stride;
    for (let x = 0; x < width; x++) {
      const [dx, dy] = mapping(x, y, width, height);
      const src = rowStart + x * channels;
      const dst = dy * outStride + dx * channels;
      for (let c = 0; c < channels; c++) {
        data[dst + c] = buffer.data[src + c];
      }
    }
  }

  return {
    data,
    width: size.width,
    height: size.height,
    stride: outStride,
    layout: buffer.layout,
    orientation: UPRIGHT,
  };
}
