import type { NormalizedRegion } from '../models/index.js';

export interface PixelBox {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

function clamp01(value: number): number {
  return Math.min(Math.max(value, 0), 1);
}

// Values already inside [0, 1] pass through untouched.
function clampSpan(start: number, size: number): [number, number] {
  const end = start + size;
  if (start >= 0 && end <= 1) {
    return [start, size];
  }
  const clampedStart = clamp01(start);
  return [clampedStart, Math.max(0, clamp01(end) - clampedStart)];
}

function clampBox(box: NormalizedRegion): NormalizedRegion {
  const [x, width] = clampSpan(box.x, box.width);
  const [y, height] = clampSpan(box.y, box.height);
  return { x, y, width, height };
}

/** Pixel box with a top-left origin -> normalized top-left box. */
export function fromPixelBox(box: PixelBox, imageWidth: number, imageHeight: number): NormalizedRegion {
  return clampBox({
    x: box.x / imageWidth,
    y: box.y / imageHeight,
    width: box.width / imageWidth,
    height: box.height / imageHeight,
  });
}

/** Normalized box whose `y` is measured from the bottom edge -> top-left origin. */
export function fromBottomLeftBox(box: NormalizedRegion): NormalizedRegion {
  return clampBox({
    x: box.x,
    y: 1 - box.y - box.height,
    width: box.width,
    height: box.height,
  });
}

export function isFiniteBox(box: NormalizedRegion): boolean {
  return [box.x, box.y, box.width, box.height].every(Number.isFinite);
}
