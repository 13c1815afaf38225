import { tmpdir } from 'node:os';
import { describe, expect, it } from 'vitest';
import { DEFAULT_SCAN_CONFIG, resolveScanConfig, resolveScanOptions } from '../src/config.js';
import { InvalidInputError } from '../src/exceptions.js';

describe('resolveScanConfig', () => {
  it('fills in defaults', () => {
    expect(resolveScanConfig()).toEqual({
      minRecognitionSide: 640,
      maxUpscaledSide: 8192,
      recognitionQuality: 'accurate',
      recognitionTimeoutMs: 30000,
      debugImage: 'auto',
      debugImageQuality: 80,
      tempDir: tmpdir(),
    });
  });

  it('applies overrides', () => {
    const config = resolveScanConfig({ recognitionQuality: 'fast', debugImage: 'never' });
    expect(config.recognitionQuality).toBe('fast');
    expect(config.debugImage).toBe('never');
    expect(config.minRecognitionSide).toBe(DEFAULT_SCAN_CONFIG.minRecognitionSide);
  });

  it('rejects inconsistent upscale bounds', () => {
    expect(() => resolveScanConfig({ minRecognitionSide: 1000, maxUpscaledSide: 500 })).toThrow(
      'Invalid upscale bounds: min 1000, max 500',
    );
    expect(() => resolveScanConfig({ minRecognitionSide: 0 })).toThrow(RangeError);
  });
});

describe('resolveScanOptions', () => {
  it('defaults to text mode, neutral contrast and region use', () => {
    expect(resolveScanOptions()).toEqual({ digitsOnly: false, contrast: 1, useRegion: true });
  });

  it('treats undefined fields as defaults', () => {
    expect(resolveScanOptions({ digitsOnly: undefined, contrast: 2 })).toEqual({
      digitsOnly: false,
      contrast: 2,
      useRegion: true,
    });
  });

  it('rejects negative or non-finite contrast', () => {
    expect(() => resolveScanOptions({ contrast: -0.5 })).toThrow(InvalidInputError);
    expect(() => resolveScanOptions({ contrast: Number.NaN })).toThrow(
      'Contrast must be a finite number >= 0, got NaN',
    );
  });
});
