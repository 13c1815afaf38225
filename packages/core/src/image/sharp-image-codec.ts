import sharp from 'sharp';
import { EncodingFailureError, ImageLoadError } from '../exceptions.js';
import type { ImageBuffer } from '../models/index.js';
import { createImageBuffer, layoutForChannels, toOrientation } from '../models/index.js';
import type { EncodedFormat, ImageCodecPort } from '../ports/image-codec.js';
import { toSharp } from './raw-image.js';

export class SharpImageCodec implements ImageCodecPort {
  async decode(filePath: string): Promise<ImageBuffer> {
    try {
      // No .rotate(): pixels stay in stored order and the EXIF tag travels with them.
      const image = sharp(filePath, { failOn: 'none' });
      const metadata = await image.metadata();
      const { data, info } = await image
        .clone()
        .removeAlpha()
        .raw()
        .toBuffer({ resolveWithObject: true });

      return createImageBuffer({
        data: new Uint8Array(data.buffer, data.byteOffset, data.byteLength),
        width: info.width,
        height: info.height,
        layout: layoutForChannels(info.channels),
        orientation: toOrientation(metadata.orientation),
      });
    } catch (error) {
      throw new ImageLoadError(filePath, error);
    }
  }

  async encode(buffer: ImageBuffer, format: EncodedFormat, quality = 80): Promise<Uint8Array> {
    try {
      const pipeline = toSharp(buffer);
      const encoded =
        format === 'jpeg'
          ? await pipeline.jpeg({ quality }).toBuffer()
          : await pipeline.png({ compressionLevel: 9, adaptiveFiltering: true }).toBuffer();
      return new Uint8Array(encoded.buffer, encoded.byteOffset, encoded.byteLength);
    } catch (error) {
      throw new EncodingFailureError(
        `Could not encode ${buffer.width}x${buffer.height} image as ${format}`,
        error,
      );
    }
  }
}
