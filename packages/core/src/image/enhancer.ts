import type { ScanConfig } from '../config.js';
import { DEFAULT_SCAN_CONFIG } from '../config.js';
import { CropFailureError } from '../exceptions.js';
import { createLogger } from '../logger.js';
import type { ImageBuffer, PixelRegion, ScanOptions } from '../models/index.js';
import { fromSharp, toSharp } from './raw-image.js';
import { applyLookupTable, buildToneCurve } from './tone-curve.js';

const log = createLogger('Enhance');

const MAX_VALUE = 255;

interface EnhanceProfile {
  /** Weight of the 4-neighbour Laplacian added to each pixel */
  readonly sharpenStrength: number;
  readonly maxContrast: number;
  readonly brightness: number;
  readonly toneCurveStrength: number;
  readonly unsharp: { readonly sigma: number; readonly flat: number; readonly jagged: number };
}

const TEXT_PROFILE: EnhanceProfile = {
  sharpenStrength: 0.5,
  maxContrast: 2.0,
  brightness: 0,
  toneCurveStrength: 0,
  unsharp: { sigma: 2.0, flat: 0.5, jagged: 1.0 },
};

// Digit strokes are thin; they get crisper edges and a stronger push off the background.
const DIGITS_PROFILE: EnhanceProfile = {
  sharpenStrength: 1.0,
  maxContrast: 2.5,
  brightness: 10,
  toneCurveStrength: 0.6,
  unsharp: { sigma: 2.0, flat: 1.0, jagged: 2.0 },
};

export function enhanceProfile(digitsOnly: boolean): EnhanceProfile {
  return digitsOnly ? DIGITS_PROFILE : TEXT_PROFILE;
}

export interface ContrastParameters {
  readonly scale: number;
  readonly offset: number;
}

/** `output = input * scale + offset`, with mid-gray held in place before the brightness bias. */
export function contrastParameters(options: Pick<ScanOptions, 'contrast' | 'digitsOnly'>): ContrastParameters {
  const profile = enhanceProfile(options.digitsOnly);
  const scale = Math.min(Math.max(options.contrast, 1.0), profile.maxContrast);
  const offset = ((1 - scale) / 2) * MAX_VALUE + profile.brightness;
  return { scale, offset };
}

export function upscaledSize(
  width: number,
  height: number,
  config: Pick<ScanConfig, 'minRecognitionSide' | 'maxUpscaledSide'> = DEFAULT_SCAN_CONFIG,
): { width: number; height: number } {
  const shortSide = Math.min(width, height);
  if (shortSide >= config.minRecognitionSide) {
    return { width, height };
  }

  const scale = Math.min(
    config.minRecognitionSide / shortSide,
    config.maxUpscaledSide / Math.max(width, height),
  );
  if (scale <= 1) {
    return { width, height };
  }
  return {
    width: Math.max(1, Math.round(width * scale)),
    height: Math.max(1, Math.round(height * scale)),
  };
}

export async function cropStage(buffer: ImageBuffer, region?: PixelRegion): Promise<ImageBuffer> {
  if (!region) {
    return buffer;
  }

  const { x, y, width, height } = region;
  const fits =
    Number.isInteger(x) &&
    Number.isInteger(y) &&
    x >= 0 &&
    y >= 0 &&
    width > 0 &&
    height > 0 &&
    x + width <= buffer.width &&
    y + height <= buffer.height;
  if (!fits) {
    throw new CropFailureError(
      `Cannot crop {x: ${x}, y: ${y}, width: ${width}, height: ${height}} ` +
        `from a ${buffer.width}x${buffer.height} image`,
    );
  }

  return fromSharp(toSharp(buffer).extract({ left: x, top: y, width, height }), buffer.layout);
}

export async function upscaleStage(
  buffer: ImageBuffer,
  config: Pick<ScanConfig, 'minRecognitionSide' | 'maxUpscaledSide'> = DEFAULT_SCAN_CONFIG,
): Promise<ImageBuffer> {
  const target = upscaledSize(buffer.width, buffer.height, config);
  if (target.width === buffer.width && target.height === buffer.height) {
    return buffer;
  }

  log.info(`Upscaling ${buffer.width}x${buffer.height} -> ${target.width}x${target.height}`);
  return fromSharp(
    toSharp(buffer).resize({
      width: target.width,
      height: target.height,
      fit: 'fill',
      kernel: 'lanczos3',
    }),
    buffer.layout,
  );
}

export async function sharpenStage(buffer: ImageBuffer, digitsOnly: boolean): Promise<ImageBuffer> {
  const k = enhanceProfile(digitsOnly).sharpenStrength;
  return fromSharp(
    toSharp(buffer).convolve({
      width: 3,
      height: 3,
      kernel: [0, -k, 0, -k, 1 + 4 * k, -k, 0, -k, 0],
      scale: 1,
      offset: 0,
    }),
    buffer.layout,
  );
}

export async function contrastStage(
  buffer: ImageBuffer,
  options: Pick<ScanOptions, 'contrast' | 'digitsOnly'>,
): Promise<ImageBuffer> {
  const { scale, offset } = contrastParameters(options);
  if (scale === 1 && offset === 0) {
    return buffer;
  }

  if (buffer.layout === 'rgba') {
    return fromSharp(
      toSharp(buffer).linear([scale, scale, scale, 1], [offset, offset, offset, 0]),
      buffer.layout,
    );
  }
  return fromSharp(toSharp(buffer).linear(scale, offset), buffer.layout);
}

export function toneCurveStage(buffer: ImageBuffer, digitsOnly: boolean): ImageBuffer {
  const strength = enhanceProfile(digitsOnly).toneCurveStrength;
  if (strength === 0) {
    return buffer;
  }
  return applyLookupTable(buffer, buildToneCurve(strength));
}

export async function unsharpMaskStage(buffer: ImageBuffer, digitsOnly: boolean): Promise<ImageBuffer> {
  const { sigma, flat, jagged } = enhanceProfile(digitsOnly).unsharp;
  return fromSharp(toSharp(buffer).sharpen({ sigma, m1: flat, m2: jagged }), buffer.layout);
}

/**
 * Prepares an upright image for recognition: crop, upscale-if-small, sharpen,
 * contrast/brightness, tone curve (digits only), unsharp mask.
 */
export async function enhance(
  buffer: ImageBuffer,
  region: PixelRegion | undefined,
  options: Pick<ScanOptions, 'contrast' | 'digitsOnly'>,
  config: Pick<ScanConfig, 'minRecognitionSide' | 'maxUpscaledSide'> = DEFAULT_SCAN_CONFIG,
): Promise<ImageBuffer> {
  const cropped = await cropStage(buffer, region);
  const upscaled = await upscaleStage(cropped, config);
  const sharpened = await sharpenStage(upscaled, options.digitsOnly);
  const adjusted = await contrastStage(sharpened, options);
  const toned = toneCurveStage(adjusted, options.digitsOnly);
  return unsharpMaskStage(toned, options.digitsOnly);
}
