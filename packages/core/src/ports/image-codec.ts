import type { ImageBuffer } from '../models/index.js';

export type EncodedFormat = 'jpeg' | 'png';

export interface ImageCodecPort {
  /** Decode an image file into raw pixels, keeping its stored orientation tag */
  decode(filePath: string): Promise<ImageBuffer>;
  encode(buffer: ImageBuffer, format: EncodedFormat, quality?: number): Promise<Uint8Array>;
}
