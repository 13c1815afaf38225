import { tmpdir } from 'node:os';
import { InvalidInputError } from './exceptions.js';
import type { ScanOptions } from './models/index.js';
import { DEFAULT_SCAN_OPTIONS } from './models/index.js';
import type { RecognitionQuality } from './ports/recognition-engine.js';

export type DebugImagePolicy = 'auto' | 'always' | 'never';

export interface ScanConfig {
  /** Images whose short side is below this are upscaled to it */
  readonly minRecognitionSide: number;
  /** Upper bound for the long side after upscaling */
  readonly maxUpscaledSide: number;
  readonly recognitionQuality: RecognitionQuality;
  /** Engine call timeout in milliseconds; 0 disables it */
  readonly recognitionTimeoutMs: number;
  /** `auto` writes the processed image when a region is used or contrast is not 1 */
  readonly debugImage: DebugImagePolicy;
  readonly debugImageQuality: number;
  readonly tempDir: string;
}

export const DEFAULT_SCAN_CONFIG: ScanConfig = {
  minRecognitionSide: 640,
  maxUpscaledSide: 8192,
  recognitionQuality: 'accurate',
  recognitionTimeoutMs: 30000,
  debugImage: 'auto',
  debugImageQuality: 80,
  tempDir: tmpdir(),
};

export function resolveScanConfig(overrides: Partial<ScanConfig> = {}): ScanConfig {
  const config = { ...DEFAULT_SCAN_CONFIG, ...overrides };
  if (config.minRecognitionSide <= 0 || config.maxUpscaledSide < config.minRecognitionSide) {
    throw new RangeError(
      `Invalid upscale bounds: min ${config.minRecognitionSide}, max ${config.maxUpscaledSide}`,
    );
  }
  return config;
}

export function resolveScanOptions(overrides: Partial<ScanOptions> = {}): ScanOptions {
  const options: ScanOptions = {
    digitsOnly: overrides.digitsOnly ?? DEFAULT_SCAN_OPTIONS.digitsOnly,
    contrast: overrides.contrast ?? DEFAULT_SCAN_OPTIONS.contrast,
    useRegion: overrides.useRegion ?? DEFAULT_SCAN_OPTIONS.useRegion,
  };
  if (!Number.isFinite(options.contrast) || options.contrast < 0) {
    throw new InvalidInputError(`Contrast must be a finite number >= 0, got ${options.contrast}`);
  }
  return options;
}
