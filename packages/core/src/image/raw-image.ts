import sharp, { type Sharp } from 'sharp';
import type { ImageBuffer, PixelLayout } from '../models/index.js';
import { UPRIGHT, channelCount, ensurePacked, layoutForChannels } from '../models/index.js';

export function toSharp(buffer: ImageBuffer): Sharp {
  const packed = ensurePacked(buffer);
  return sharp(packed.data, {
    raw: {
      width: packed.width,
      height: packed.height,
      channels: channelCount(packed.layout),
    },
  });
}

/**
 * Reads the pipeline back as raw pixels. Convolution and sharpening widen
 * single-channel input to sRGB, so `sourceLayout: 'gray'` folds it back.
 */
export async function fromSharp(pipeline: Sharp, sourceLayout?: PixelLayout): Promise<ImageBuffer> {
  const output = sourceLayout === 'gray' ? pipeline.toColourspace('b-w') : pipeline;
  const { data, info } = await output.raw().toBuffer({ resolveWithObject: true });
  const layout = layoutForChannels(info.channels);
  return {
    data: new Uint8Array(data.buffer, data.byteOffset, data.byteLength),
    width: info.width,
    height: info.height,
    stride: info.width * channelCount(layout),
    layout,
    orientation: UPRIGHT,
  };
}
