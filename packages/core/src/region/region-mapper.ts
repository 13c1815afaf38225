import { InvalidRegionError } from '../exceptions.js';
import type { NormalizedRegion, PixelRegion } from '../models/index.js';

/** Rounds .5 away from zero, independent of the sign of the value. */
export function roundHalfAwayFromZero(value: number): number {
  return Math.sign(value) * Math.round(Math.abs(value));
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

export function validateNormalizedRegion(region: NormalizedRegion): void {
  const entries: [string, number][] = [
    ['x', region.x],
    ['y', region.y],
    ['width', region.width],
    ['height', region.height],
  ];
  for (const [key, value] of entries) {
    if (!Number.isFinite(value) || value < 0 || value > 1) {
      throw new InvalidRegionError(`Region ${key} must be within [0, 1], got ${value}`);
    }
  }
}

/**
 * Maps a normalized region onto an upright image of the given size.
 *
 * The extent is measured from the unclamped start, so a region starting at
 * the right or bottom edge collapses to zero size and is rejected instead of
 * being pulled back into a one-pixel sliver.
 */
export function mapRegion(
  region: NormalizedRegion,
  imageWidth: number,
  imageHeight: number,
): PixelRegion {
  if (!Number.isInteger(imageWidth) || !Number.isInteger(imageHeight) || imageWidth <= 0 || imageHeight <= 0) {
    throw new InvalidRegionError(`Invalid image dimensions: ${imageWidth}x${imageHeight}`);
  }
  validateNormalizedRegion(region);

  const rawX = roundHalfAwayFromZero(region.x * imageWidth);
  const rawY = roundHalfAwayFromZero(region.y * imageHeight);
  const width = Math.min(roundHalfAwayFromZero(region.width * imageWidth), imageWidth - rawX);
  const height = Math.min(roundHalfAwayFromZero(region.height * imageHeight), imageHeight - rawY);

  if (width <= 0 || height <= 0) {
    throw new InvalidRegionError(
      `Region {x: ${region.x}, y: ${region.y}, width: ${region.width}, height: ${region.height}} ` +
        `is empty on a ${imageWidth}x${imageHeight} image`,
    );
  }

  return {
    x: clamp(rawX, 0, imageWidth - 1),
    y: clamp(rawY, 0, imageHeight - 1),
    width,
    height,
  };
}

export function toNormalizedRegion(
  region: PixelRegion,
  imageWidth: number,
  imageHeight: number,
): NormalizedRegion {
  return {
    x: region.x / imageWidth,
    y: region.y / imageHeight,
    width: region.width / imageWidth,
    height: region.height / imageHeight,
  };
}

/** True when the rectangles share interior area; touching edges do not count. */
export function intersects(a: NormalizedRegion, b: NormalizedRegion): boolean {
  return (
    a.x < b.x + b.width &&
    b.x < a.x + a.width &&
    a.y < b.y + b.height &&
    b.y < a.y + a.height
  );
}
