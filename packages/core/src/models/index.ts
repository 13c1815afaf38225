export type { NormalizedRegion, PixelRegion } from './region.js';
export { FULL_FRAME } from './region.js';
export type {
  ChannelCount,
  ImageBuffer,
  ImageBufferInit,
  Orientation,
  PixelLayout,
} from './image-buffer.js';
export {
  UPRIGHT,
  channelCount,
  createImageBuffer,
  ensurePacked,
  isPacked,
  layoutForChannels,
  packRows,
  toOrientation,
} from './image-buffer.js';
export type { RecognizedLine, ScanOptions, ScanResult } from './scan.js';
export { DEFAULT_SCAN_OPTIONS } from './scan.js';
