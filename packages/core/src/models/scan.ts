import type { NormalizedRegion } from './region.js';

export interface ScanOptions {
  /** Restrict output to digits and numeric punctuation, and tune enhancement for it */
  readonly digitsOnly: boolean;
  /** Contrast factor; values below 1 are treated as 1 */
  readonly contrast: number;
  /** When false, a supplied region is ignored and the whole image is scanned */
  readonly useRegion: boolean;
}

export const DEFAULT_SCAN_OPTIONS: ScanOptions = {
  digitsOnly: false,
  contrast: 1.0,
  useRegion: true,
};

export interface ScanResult {
  readonly text: string;
  /** Local path of the processed image handed to recognition, if one was written */
  readonly debugImagePath?: string;
}

export interface RecognizedLine {
  readonly text: string;
  /** Top-left-origin normalized box relative to the image given to the engine */
  readonly boundingBox: NormalizedRegion;
  /** Engine confidence (0-100) when the engine reports one */
  readonly confidence?: number;
}
