import type { ImageBuffer } from '../models/index.js';
import { channelCount, ensurePacked } from '../models/index.js';

/**
 * Lookup table for a smoothstep S-curve blended with the identity.
 * 0 and 255 map to themselves; midtones are pushed apart.
 */
export function buildToneCurve(strength: number): Uint8Array {
  const lut = new Uint8Array(256);
  for (let v = 0; v < 256; v++) {
    const t = v / 255;
    const s = t * t * (3 - 2 * t);
    lut[v] = Math.round(((1 - strength) * t + strength * s) * 255);
  }
  return lut;
}

export function applyLookupTable(buffer: ImageBuffer, lut: Uint8Array): ImageBuffer {
  const packed = ensurePacked(buffer);
  const channels = channelCount(packed.layout);
  const hasAlpha = packed.layout === 'rgba';
  const data = new Uint8Array(packed.data.length);

  for (let i = 0; i < packed.data.length; i++) {
    const isAlpha = hasAlpha && i % channels === channels - 1;
    data[i] = isAlpha ? packed.data[i] : lut[packed.data[i]];
  }

  return { ...packed, data };
}
