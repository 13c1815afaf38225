/** Rectangle expressed as fractions of the upright image, origin top-left. */
export interface NormalizedRegion {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

/** Rectangle in absolute pixels, always inside the image it was mapped against. */
export interface PixelRegion {
  readonly x: number;
  readonly y: number;
  readonly width: number;
  readonly height: number;
}

export const FULL_FRAME: NormalizedRegion = { x: 0, y: 0, width: 1, height: 1 };
