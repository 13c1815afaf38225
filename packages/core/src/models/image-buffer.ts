/**
 * EXIF orientation code. `1` means the stored rows are already upright;
 * the other seven describe the rotation/mirroring needed to display them.
 */
export type Orientation = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8;

export const UPRIGHT: Orientation = 1;

export type PixelLayout = 'gray' | 'rgb' | 'rgba';

export type ChannelCount = 1 | 3 | 4;

const CHANNELS: Record<PixelLayout, ChannelCount> = {
  gray: 1,
  rgb: 3,
  rgba: 4,
};

export interface ImageBuffer {
  readonly data: Uint8Array;
  readonly width: number;
  readonly height: number;
  /** Bytes per row; at least `width * channelCount(layout)` */
  readonly stride: number;
  readonly layout: PixelLayout;
  readonly orientation: Orientation;
}

export interface ImageBufferInit {
  data: Uint8Array;
  width: number;
  height: number;
  layout: PixelLayout;
  stride?: number;
  orientation?: Orientation;
}

export function channelCount(layout: PixelLayout): ChannelCount {
  return CHANNELS[layout];
}

export function layoutForChannels(channels: number): PixelLayout {
  switch (channels) {
    case 1:
      return 'gray';
    case 3:
      return 'rgb';
    case 4:
      return 'rgba';
    default:
      throw new RangeError(`Unsupported channel count: ${channels}`);
  }
}

const ORIENTATIONS: readonly Orientation[] = [1, 2, 3, 4, 5, 6, 7, 8];

/** Maps anything that is not a known EXIF orientation code to upright. */
export function toOrientation(value: unknown): Orientation {
  return ORIENTATIONS.find((orientation) => orientation === value) ?? UPRIGHT;
}

export function createImageBuffer(init: ImageBufferInit): ImageBuffer {
  const { data, width, height, layout } = init;
  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new RangeError(`Invalid image dimensions: ${width}x${height}`);
  }

  const rowBytes = width * channelCount(layout);
  const stride = init.stride ?? rowBytes;
  if (stride < rowBytes) {
    throw new RangeError(`Row stride ${stride} is shorter than a row of ${rowBytes} bytes`);
  }
  if (data.length < stride * (height - 1) + rowBytes) {
    throw new RangeError(
      `Pixel data holds ${data.length} bytes, expected at least ${stride * (height - 1) + rowBytes}`,
    );
  }

  return {
    data,
    width,
    height,
    stride,
    layout,
    orientation: toOrientation(init.orientation),
  };
}

export function isPacked(buffer: ImageBuffer): boolean {
  return buffer.stride === buffer.width * channelCount(buffer.layout);
}

/** Returns a copy of the buffer with rows laid out back to back. */
export function packRows(buffer: ImageBuffer): ImageBuffer {
  const rowBytes = buffer.width * channelCount(buffer.layout);
  const data = new Uint8Array(rowBytes * buffer.height);
  for (let y = 0; y < buffer.height; y++) {
    const start = y * buffer.stride;
    data.set(buffer.data.subarray(start, start + rowBytes), y * rowBytes);
  }
  return { ...buffer, data, stride: rowBytes };
}

/** The buffer itself when its rows are already back to back with no trailing bytes. */
export function ensurePacked(buffer: ImageBuffer): ImageBuffer {
  const exact = isPacked(buffer) && buffer.data.length === buffer.stride * buffer.height;
  return exact ? buffer : packRows(buffer);
}
